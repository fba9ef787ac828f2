/**
 * Catalog Store
 *
 * In-process retrieval backend over a JSON course catalog. Passages are
 * ranked by how many of the query's terms they contain.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { z } from 'zod';
import type {
  ChunkMetadata,
  CourseOutline,
  RetrievalBackend,
  RetrievalOutcome,
  SearchQuery,
} from './types.js';
import { emptyOutcome, errorOutcome } from './types.js';
import { RetrievalError } from '../errors/types.js';
import { getLogger } from '../utils/logger.js';

const LessonSchema = z.object({
  number: z.number().int().nonnegative(),
  title: z.string(),
  link: z.string().optional(),
  passages: z.array(z.string()).default([]),
});

const CourseSchema = z.object({
  title: z.string().min(1),
  link: z.string().optional(),
  instructor: z.string().optional(),
  lessons: z.array(LessonSchema).default([]),
});

const CatalogSchema = z.object({
  courses: z.array(CourseSchema),
});

export type Catalog = z.infer<typeof CatalogSchema>;
export type CatalogCourse = z.infer<typeof CourseSchema>;

export interface CatalogStoreOptions {
  maxResults: number;
}

const MIN_TERM_LENGTH = 3;

/**
 * Lowercased, de-duplicated terms of a text
 */
export function extractTerms(text: string): string[] {
  const terms = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(term => term.length >= MIN_TERM_LENGTH);
  return Array.from(new Set(terms));
}

interface ScoredPassage {
  document: string;
  metadata: ChunkMetadata;
  distance: number;
}

export class CatalogStore implements RetrievalBackend {
  private options: CatalogStoreOptions;

  constructor(
    private catalog: Catalog,
    options?: Partial<CatalogStoreOptions>
  ) {
    this.options = {
      maxResults: options?.maxResults ?? 5,
    };
  }

  /**
   * Load and validate a catalog file
   */
  static async fromFile(
    catalogPath: string,
    options?: Partial<CatalogStoreOptions>
  ): Promise<CatalogStore> {
    const resolved = path.resolve(catalogPath);
    if (!(await fs.pathExists(resolved))) {
      throw new RetrievalError(`Catalog not found: ${resolved}`, 'catalog_not_found');
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(resolved);
    } catch (error) {
      throw new RetrievalError(
        `Catalog is not valid JSON: ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
        'invalid_catalog'
      );
    }

    const parsed = CatalogSchema.safeParse(raw);
    if (!parsed.success) {
      const messages = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
      throw new RetrievalError(`Invalid catalog ${resolved}:\n${messages.join('\n')}`, 'invalid_catalog');
    }

    getLogger().debug({ path: resolved, courses: parsed.data.courses.length }, 'Catalog loaded');
    return new CatalogStore(parsed.data, options);
  }

  getCourseTitles(): string[] {
    return this.catalog.courses.map(course => course.title);
  }

  async search(query: SearchQuery): Promise<RetrievalOutcome> {
    let courses = this.catalog.courses;

    if (query.courseName !== undefined) {
      const course = this.resolveCourse(query.courseName);
      if (!course) {
        return errorOutcome(`No course found matching '${query.courseName}'`);
      }
      courses = [course];
    }

    const terms = extractTerms(query.query);
    if (terms.length === 0) {
      return emptyOutcome();
    }

    const scored: ScoredPassage[] = [];
    for (const course of courses) {
      for (const lesson of course.lessons) {
        if (query.lessonNumber !== undefined && lesson.number !== query.lessonNumber) {
          continue;
        }
        lesson.passages.forEach((passage, chunkIndex) => {
          const passageTerms = new Set(extractTerms(passage));
          const matched = terms.filter(term => passageTerms.has(term)).length;
          if (matched === 0) {
            return;
          }
          scored.push({
            document: passage,
            metadata: {
              courseTitle: course.title,
              lessonNumber: lesson.number,
              lessonTitle: lesson.title,
              chunkIndex,
            },
            distance: 1 - matched / terms.length,
          });
        });
      }
    }

    // Array#sort is stable, so ties keep catalog order
    const top = scored
      .sort((a, b) => a.distance - b.distance)
      .slice(0, this.options.maxResults);

    return {
      documents: top.map(p => p.document),
      metadata: top.map(p => p.metadata),
      distances: top.map(p => p.distance),
    };
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined> {
    const course = this.catalog.courses.find(c => c.title === courseTitle);
    return course?.lessons.find(lesson => lesson.number === lessonNumber)?.link;
  }

  async getCourseOutline(courseName: string): Promise<CourseOutline | undefined> {
    const course = this.resolveCourse(courseName);
    if (!course) {
      return undefined;
    }

    return {
      title: course.title,
      link: course.link,
      instructor: course.instructor,
      lessons: course.lessons.map(lesson => ({
        lessonNumber: lesson.number,
        title: lesson.title,
        link: lesson.link,
      })),
    };
  }

  /**
   * Exact title first (case-insensitive), then the first title containing the name
   */
  private resolveCourse(courseName: string): CatalogCourse | undefined {
    const wanted = courseName.trim().toLowerCase();
    if (!wanted) {
      return undefined;
    }

    const courses = this.catalog.courses;
    return (
      courses.find(course => course.title.toLowerCase() === wanted) ??
      courses.find(course => course.title.toLowerCase().includes(wanted))
    );
  }
}
