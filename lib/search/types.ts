/**
 * Query contract for the course vector store.
 */

import type { CourseOutline } from '@/types';

/**
 * Conjunction of metadata constraints. A missing field leaves that
 * dimension unconstrained.
 */
export interface SearchFilter {
  readonly courseTitle?: string;
  readonly lessonNumber?: number;
}

/**
 * One ranked chunk returned by a search.
 */
export interface SearchHit {
  content: string;
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
  /** Cosine similarity, higher is closer */
  score: number;
}

/**
 * Hits ranked by descending score, at most top-K long. Empty is a valid result.
 */
export type SearchResult = SearchHit[];

export interface VectorStore {
  /**
   * Nearest catalog title to the reference, or null when nothing clears the
   * similarity threshold.
   *
   * @throws StoreUnavailableError
   */
  resolveCourseName(queryText: string): Promise<string | null>;

  /**
   * @throws StoreUnavailableError
   */
  search(queryText: string, filter: SearchFilter, topK: number): Promise<SearchResult>;

  listCourseTitles(): Promise<string[]>;

  getCourseCount(): Promise<number>;

  getCourseOutline(courseTitle: string): Promise<CourseOutline | null>;

  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
}
