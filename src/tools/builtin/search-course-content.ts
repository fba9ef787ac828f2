/**
 * Course Content Search Tool
 *
 * Searches lesson passages through the retrieval backend and cites each
 * distinct course/lesson pair it returns.
 */

import { z } from 'zod';
import type { Source, Tool, ToolParameter } from '../types.js';
import { COURSE_TOOLS } from '../types.js';
import type { RetrievalBackend, RetrievalOutcome } from '../../retrieval/types.js';
import { isEmptyOutcome } from '../../retrieval/types.js';
import { parseToolInput } from '../validation.js';

const PARAMETERS: Record<string, ToolParameter> = {
  query: {
    type: 'string',
    description: 'What to search for in the course content',
    required: true,
  },
  course_name: {
    type: 'string',
    description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
    required: false,
  },
  lesson_number: {
    type: 'integer',
    description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
    required: false,
  },
};

// Models send "2" for 2 and null for an unused filter
const InputSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().nullish().transform(value => value ?? undefined),
  lesson_number: z.coerce.number().int().min(0).nullish().transform(value => value ?? undefined),
});

/**
 * Message for a search that matched nothing, qualified by its filters
 */
export function noContentMessage(courseName?: string, lessonNumber?: number): string {
  let filterInfo = '';
  if (courseName !== undefined) {
    filterInfo += ` in course '${courseName}'`;
  }
  if (lessonNumber !== undefined) {
    filterInfo += ` in lesson ${lessonNumber}`;
  }
  return `No relevant content found${filterInfo}.`;
}

export class CourseSearchTool implements Tool {
  readonly name = COURSE_TOOLS.SEARCH_CONTENT;
  readonly description =
    'Search course materials with smart course name matching and lesson filtering';
  readonly parameters = PARAMETERS;

  private lastSources: Source[] = [];

  constructor(private backend: RetrievalBackend) {}

  async execute(input: Record<string, unknown>): Promise<string> {
    this.lastSources = [];

    const params = parseToolInput(InputSchema, input, this.name);
    const outcome = await this.backend.search({
      query: params.query,
      courseName: params.course_name,
      lessonNumber: params.lesson_number,
    });

    // Backend errors are the answer, verbatim
    if (outcome.error !== undefined) {
      return outcome.error;
    }

    if (isEmptyOutcome(outcome)) {
      return noContentMessage(params.course_name, params.lesson_number);
    }

    return this.formatResults(outcome);
  }

  getLastSources(): Source[] {
    return [...this.lastSources];
  }

  resetSources(): void {
    this.lastSources = [];
  }

  /**
   * One block per passage, in backend order
   */
  private async formatResults(outcome: RetrievalOutcome): Promise<string> {
    const blocks: string[] = [];
    const sources: Source[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < outcome.documents.length; i++) {
      const meta = outcome.metadata[i] ?? {};
      const courseTitle = meta.courseTitle ?? 'unknown';
      const lessonNumber = meta.lessonNumber;

      let header = `[${courseTitle}`;
      if (lessonNumber !== undefined) {
        header += ` - Lesson ${lessonNumber}`;
      }
      header += ']';
      blocks.push(`${header}\n${outcome.documents[i]}`);

      // One citation per course/lesson, whatever the chunk or link
      const key = lessonNumber !== undefined ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const link = lessonNumber !== undefined
        ? await this.backend.getLessonLink(courseTitle, lessonNumber)
        : undefined;
      sources.push(link !== undefined ? { text: key, link } : { text: key });
    }

    this.lastSources = sources;
    return blocks.join('\n\n');
  }
}
