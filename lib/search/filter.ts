import type { SearchFilter } from './types';

/**
 * Build a search filter from a resolved course title and lesson number.
 *
 * Pure: identical arguments always produce an equal filter, and absent
 * values are left out rather than stored as null.
 */
export function buildSearchFilter(
  courseTitle?: string | null,
  lessonNumber?: number | null
): SearchFilter {
  return {
    ...(courseTitle != null ? { courseTitle } : {}),
    ...(lessonNumber != null ? { lessonNumber } : {}),
  };
}

export function matchesFilter(
  filter: SearchFilter,
  chunk: { courseTitle: string; lessonNumber: number | null }
): boolean {
  if (filter.courseTitle !== undefined && chunk.courseTitle !== filter.courseTitle) {
    return false;
  }
  if (filter.lessonNumber !== undefined && chunk.lessonNumber !== filter.lessonNumber) {
    return false;
  }
  return true;
}

/**
 * Human-readable description used in "nothing found" messages.
 */
export function describeFilter(filter: SearchFilter): string {
  let description = '';
  if (filter.courseTitle !== undefined) {
    description += ` in course '${filter.courseTitle}'`;
  }
  if (filter.lessonNumber !== undefined) {
    description += ` in lesson ${filter.lessonNumber}`;
  }
  return description;
}
