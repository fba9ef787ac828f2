/**
 * Course Outline Tool
 */

import { z } from 'zod';
import type { Source, Tool, ToolParameter } from '../types.js';
import { COURSE_TOOLS } from '../types.js';
import type { CourseOutline, RetrievalBackend } from '../../retrieval/types.js';
import { parseToolInput } from '../validation.js';

const PARAMETERS: Record<string, ToolParameter> = {
  course_name: {
    type: 'string',
    description: "Course title or part of it (e.g. 'MCP', 'Introduction')",
    required: true,
  },
};

const InputSchema = z.object({
  course_name: z.string().min(1),
});

export function formatOutline(outline: CourseOutline): string {
  const lines = [`Course Title: ${outline.title}`];
  if (outline.link) {
    lines.push(`Course Link: ${outline.link}`);
  }
  if (outline.instructor) {
    lines.push(`Instructor: ${outline.instructor}`);
  }

  lines.push('', `Lessons (${outline.lessons.length} total):`);
  for (const lesson of outline.lessons) {
    const link = lesson.link ? ` (${lesson.link})` : '';
    lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}${link}`);
  }

  return lines.join('\n');
}

export class CourseOutlineTool implements Tool {
  readonly name = COURSE_TOOLS.COURSE_OUTLINE;
  readonly description =
    'Get the outline of a course: title, link, instructor and the complete lesson list';
  readonly parameters = PARAMETERS;

  private lastSources: Source[] = [];

  constructor(private backend: RetrievalBackend) {}

  async execute(input: Record<string, unknown>): Promise<string> {
    this.lastSources = [];

    const params = parseToolInput(InputSchema, input, this.name);
    const outline = await this.backend.getCourseOutline(params.course_name);
    if (!outline) {
      return `No course found matching '${params.course_name}'`;
    }

    this.lastSources = this.collectSources(outline);
    return formatOutline(outline);
  }

  getLastSources(): Source[] {
    return [...this.lastSources];
  }

  resetSources(): void {
    this.lastSources = [];
  }

  /**
   * Course link first, then lesson links; keyed by link, not by lesson
   */
  private collectSources(outline: CourseOutline): Source[] {
    const sources: Source[] = [];
    const seenLinks = new Set<string>();

    if (outline.link) {
      seenLinks.add(outline.link);
      sources.push({ text: outline.title, link: outline.link });
    }

    for (const lesson of outline.lessons) {
      if (!lesson.link || seenLinks.has(lesson.link)) {
        continue;
      }
      seenLinks.add(lesson.link);
      sources.push({ text: `${outline.title} - Lesson ${lesson.lessonNumber}`, link: lesson.link });
    }

    return sources;
  }
}
