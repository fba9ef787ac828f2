/**
 * Catalog Store Tests
 */

import { describe, it, expect, vi, beforeAll } from 'vitest';
import { fileURLToPath } from 'node:url';
import { CatalogStore, extractTerms } from '../../src/retrieval/catalog-store.js';
import { RetrievalError } from '../../src/errors/types.js';

// Mock logger
vi.mock('../../src/utils/logger.js', () => ({
  getLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

function fixture(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

describe('extractTerms', () => {
  it('should lowercase, split on punctuation and drop short terms', () => {
    expect(extractTerms('What are Fixtures, in a test-suite?')).toEqual(['what', 'are', 'fixtures', 'test', 'suite']);
  });

  it('should de-duplicate terms', () => {
    expect(extractTerms('mocks Mocks MOCKS')).toEqual(['mocks']);
  });
});

describe('CatalogStore', () => {
  let store: CatalogStore;

  beforeAll(async () => {
    store = await CatalogStore.fromFile(fixture('catalog.json'));
  });

  describe('fromFile', () => {
    it('should list course titles in catalog order', () => {
      expect(store.getCourseTitles()).toEqual(['Intro to Testing', 'Advanced Testing Patterns']);
    });

    it('should reject a missing catalog', async () => {
      const error = await CatalogStore.fromFile(fixture('missing.json')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      if (error instanceof RetrievalError) {
        expect(error.type).toBe('catalog_not_found');
      }
    });

    it('should reject a catalog that is not JSON', async () => {
      const error = await CatalogStore.fromFile(fixture('broken-catalog.json')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      if (error instanceof RetrievalError) {
        expect(error.type).toBe('invalid_catalog');
      }
    });

    it('should reject a catalog that does not match the schema', async () => {
      const error = await CatalogStore.fromFile(fixture('invalid-catalog.json')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      if (error instanceof RetrievalError) {
        expect(error.type).toBe('invalid_catalog');
        expect(error.message).toContain('courses.0.title');
      }
    });
  });

  describe('search', () => {
    it('should rank passages by the share of query terms they contain', async () => {
      const outcome = await store.search({ query: 'fixtures state' });

      expect(outcome.error).toBeUndefined();
      expect(outcome.documents).toEqual([
        'Fixtures prepare shared state before each test runs.',
        'This course covers unit tests, fixtures and mocks.',
        'Teardown releases fixtures after the test.',
      ]);
      expect(outcome.distances).toEqual([0, 0.5, 0.5]);
      expect(outcome.metadata[0]).toEqual({
        courseTitle: 'Intro to Testing',
        lessonNumber: 1,
        lessonTitle: 'Fixtures',
        chunkIndex: 0,
      });
      expect(outcome.metadata[2].chunkIndex).toBe(1);
    });

    it('should search across every course without a filter', async () => {
      const outcome = await store.search({ query: 'unit tests' });

      expect(outcome.metadata.map(m => [m.courseTitle, m.lessonNumber])).toEqual([
        ['Intro to Testing', 0],
        ['Intro to Testing', 2],
        ['Advanced Testing Patterns', 1],
      ]);
    });

    it('should restrict results to a partially named course', async () => {
      const outcome = await store.search({ query: 'unit tests', courseName: 'patterns' });

      expect(outcome.documents).toEqual(['Property tests generate many inputs and check invariants.']);
      expect(outcome.distances).toEqual([0.5]);
    });

    it('should prefer an exact title over a partial match', async () => {
      const outcome = await store.search({ query: 'property', courseName: 'ADVANCED TESTING PATTERNS' });

      expect(outcome.metadata.map(m => m.courseTitle)).toEqual(['Advanced Testing Patterns']);
    });

    it('should restrict results to a lesson', async () => {
      const outcome = await store.search({ query: 'unit tests', lessonNumber: 2 });

      expect(outcome.documents).toEqual(['Mocks replace slow collaborators in unit tests.']);
    });

    it('should cap results at maxResults', async () => {
      const small = await CatalogStore.fromFile(fixture('catalog.json'), { maxResults: 1 });

      const outcome = await small.search({ query: 'unit tests' });

      expect(outcome.documents).toEqual(['This course covers unit tests, fixtures and mocks.']);
    });

    it('should report an unknown course before looking at the query', async () => {
      const outcome = await store.search({ query: 'a', courseName: 'Chemistry' });

      expect(outcome.error).toBe("No course found matching 'Chemistry'");
      expect(outcome.documents).toEqual([]);
    });

    it('should return an empty outcome when nothing matches', async () => {
      await expect(store.search({ query: 'quantum chromodynamics' })).resolves.toEqual({
        documents: [],
        metadata: [],
        distances: [],
      });
    });

    it('should return an empty outcome for a query without usable terms', async () => {
      const outcome = await store.search({ query: 'a of' });

      expect(outcome.documents).toEqual([]);
      expect(outcome.error).toBeUndefined();
    });
  });

  describe('getLessonLink', () => {
    it('should return the link of a lesson', async () => {
      await expect(store.getLessonLink('Intro to Testing', 1)).resolves.toBe('https://example.com/testing/1');
    });

    it('should return undefined for a lesson without a link', async () => {
      await expect(store.getLessonLink('Intro to Testing', 2)).resolves.toBeUndefined();
    });

    it('should match the course title exactly', async () => {
      await expect(store.getLessonLink('intro to testing', 1)).resolves.toBeUndefined();
    });
  });

  describe('getCourseOutline', () => {
    it('should resolve a partial name to the full outline', async () => {
      const outline = await store.getCourseOutline('intro');

      expect(outline).toEqual({
        title: 'Intro to Testing',
        link: 'https://example.com/testing',
        instructor: 'Sam Placeholder',
        lessons: [
          { lessonNumber: 0, title: 'Welcome', link: 'https://example.com/testing/0' },
          { lessonNumber: 1, title: 'Fixtures', link: 'https://example.com/testing/1' },
          { lessonNumber: 2, title: 'Mocks', link: undefined },
        ],
      });
    });

    it('should take the first course containing the name', async () => {
      const outline = await store.getCourseOutline('Testing');

      expect(outline?.title).toBe('Intro to Testing');
    });

    it('should return undefined for unknown or blank names', async () => {
      await expect(store.getCourseOutline('Chemistry')).resolves.toBeUndefined();
      await expect(store.getCourseOutline('   ')).resolves.toBeUndefined();
    });
  });
});
