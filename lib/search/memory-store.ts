import { cosineSimilarity } from '@/lib/db/vector-utils';
import type { EmbedFn } from '@/lib/ai/types';
import { StoreUnavailableError, errorMessage } from '@/lib/errors';
import type { CourseOutline } from '@/types';
import { matchesFilter } from './filter';
import type { SearchFilter, SearchResult, VectorStore } from './types';

export interface ChunkInput {
  content: string;
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
}

interface IndexedChunk extends ChunkInput {
  embedding: number[];
}

interface IndexedCourse {
  outline: CourseOutline;
  embedding: number[];
}

export interface InMemoryVectorStoreOptions {
  embed: EmbedFn;
  courseMatchThreshold: number;
}

/**
 * Vector store held entirely in process memory.
 *
 * Same contract as the pgvector store; used by tests and local runs.
 * Populate once with `fromCourses`, then treat as read-only.
 */
export class InMemoryVectorStore implements VectorStore {
  private constructor(
    private readonly embed: EmbedFn,
    private readonly courseMatchThreshold: number,
    private readonly courses: IndexedCourse[],
    private readonly chunks: IndexedChunk[]
  ) {}

  /**
   * Embed every course title and chunk up front.
   */
  static async fromCourses(
    options: InMemoryVectorStoreOptions,
    courses: CourseOutline[],
    chunks: ChunkInput[]
  ): Promise<InMemoryVectorStore> {
    const indexedCourses: IndexedCourse[] = [];
    for (const outline of courses) {
      indexedCourses.push({ outline, embedding: await options.embed(outline.title) });
    }

    const indexedChunks: IndexedChunk[] = [];
    for (const chunk of chunks) {
      indexedChunks.push({ ...chunk, embedding: await options.embed(chunk.content) });
    }

    return new InMemoryVectorStore(
      options.embed,
      options.courseMatchThreshold,
      indexedCourses,
      indexedChunks
    );
  }

  async resolveCourseName(queryText: string): Promise<string | null> {
    const queryEmbedding = await this.embedQuery(queryText);

    let bestTitle: string | null = null;
    let bestScore = -Infinity;
    for (const course of this.courses) {
      const score = cosineSimilarity(queryEmbedding, course.embedding);
      if (score > bestScore) {
        bestScore = score;
        bestTitle = course.outline.title;
      }
    }

    return bestScore >= this.courseMatchThreshold ? bestTitle : null;
  }

  async search(queryText: string, filter: SearchFilter, topK: number): Promise<SearchResult> {
    const queryEmbedding = await this.embedQuery(queryText);

    return this.chunks
      .filter((chunk) => matchesFilter(filter, chunk))
      .map((chunk) => ({
        content: chunk.content,
        courseTitle: chunk.courseTitle,
        lessonNumber: chunk.lessonNumber,
        chunkIndex: chunk.chunkIndex,
        score: cosineSimilarity(queryEmbedding, chunk.embedding),
      }))
      .sort((a, b) => b.score - a.score || a.chunkIndex - b.chunkIndex)
      .slice(0, topK);
  }

  async listCourseTitles(): Promise<string[]> {
    return this.courses.map((c) => c.outline.title).sort();
  }

  async getCourseCount(): Promise<number> {
    return this.courses.length;
  }

  async getCourseOutline(courseTitle: string): Promise<CourseOutline | null> {
    const course = this.courses.find((c) => c.outline.title === courseTitle);
    if (!course) {
      return null;
    }
    return {
      ...course.outline,
      lessons: [...course.outline.lessons].sort((a, b) => a.lessonNumber - b.lessonNumber),
    };
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    const course = this.courses.find((c) => c.outline.title === courseTitle);
    const lesson = course?.outline.lessons.find((l) => l.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  private async embedQuery(text: string): Promise<number[]> {
    try {
      return await this.embed(text);
    } catch (error) {
      throw new StoreUnavailableError(`Could not embed query: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
