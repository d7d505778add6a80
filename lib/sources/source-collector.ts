import type { Source } from '@/types';

/**
 * Key used to deduplicate sources within a turn.
 */
export function generateSourceKey(source: Pick<Source, 'courseTitle' | 'lessonNumber'>): string {
  return source.lessonNumber === null
    ? `course:${source.courseTitle}`
    : `course:${source.courseTitle}:lesson:${source.lessonNumber}`;
}

/**
 * Sources surfaced by tool executions during one query.
 *
 * Several searches in one turn can return the same lesson; the first
 * occurrence wins and its position is kept.
 */
export class SourceCollector {
  private readonly sources = new Map<string, Source>();

  add(source: Source): boolean {
    const key = generateSourceKey(source);
    if (this.sources.has(key)) {
      return false;
    }
    this.sources.set(key, { ...source });
    return true;
  }

  has(source: Pick<Source, 'courseTitle' | 'lessonNumber'>): boolean {
    return this.sources.has(generateSourceKey(source));
  }

  get(source: Pick<Source, 'courseTitle' | 'lessonNumber'>): Source | undefined {
    const found = this.sources.get(generateSourceKey(source));
    return found ? { ...found } : undefined;
  }

  get size(): number {
    return this.sources.size;
  }

  list(): Source[] {
    return Array.from(this.sources.values(), (source) => ({ ...source }));
  }
}
