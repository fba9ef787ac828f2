/**
 * Retrieval Backend Types
 */

/**
 * Metadata stored with each indexed passage
 */
export interface ChunkMetadata {
  courseTitle?: string;
  lessonNumber?: number;
  lessonTitle?: string;
  chunkIndex?: number;
}

/**
 * Outcome of one backend search. The three arrays are parallel; when `error`
 * is set they are all empty and the error is the whole answer.
 */
export interface RetrievalOutcome {
  readonly documents: readonly string[];
  readonly metadata: readonly ChunkMetadata[];
  readonly distances: readonly number[];
  readonly error?: string;
}

export interface SearchQuery {
  query: string;
  courseName?: string;
  lessonNumber?: number;
}

export interface LessonOutline {
  lessonNumber: number;
  title: string;
  link?: string;
}

export interface CourseOutline {
  title: string;
  link?: string;
  instructor?: string;
  lessons: LessonOutline[];
}

/**
 * Search service the course tools run against
 */
export interface RetrievalBackend {
  search(query: SearchQuery): Promise<RetrievalOutcome>;
  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined>;
  getCourseOutline(courseName: string): Promise<CourseOutline | undefined>;
}

export function emptyOutcome(): RetrievalOutcome {
  return { documents: [], metadata: [], distances: [] };
}

export function errorOutcome(error: string): RetrievalOutcome {
  return { documents: [], metadata: [], distances: [], error };
}

export function isEmptyOutcome(outcome: RetrievalOutcome): boolean {
  return outcome.documents.length === 0;
}
