/**
 * Builtin Tools
 */

import type { Tool } from '../types.js';
import type { RetrievalBackend } from '../../retrieval/types.js';
import { CourseSearchTool } from './search-course-content.js';
import { CourseOutlineTool } from './get-course-outline.js';

/**
 * Both course tools bound to one backend, search first
 */
export function createCourseTools(backend: RetrievalBackend): Tool[] {
  return [new CourseSearchTool(backend), new CourseOutlineTool(backend)];
}

export { CourseSearchTool, noContentMessage } from './search-course-content.js';
export { CourseOutlineTool, formatOutline } from './get-course-outline.js';
