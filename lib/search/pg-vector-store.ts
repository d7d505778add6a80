import { sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';

import type { Database } from '@/lib/db';
import { courseCatalog, courseChunks, courseLessons } from '@/lib/db/schema';
import { formatVectorLiteral } from '@/lib/db/vector-utils';
import type { EmbedFn } from '@/lib/ai/types';
import { StoreUnavailableError, errorMessage } from '@/lib/errors';
import type { CourseOutline } from '@/types';
import type { SearchFilter, SearchResult, VectorStore } from './types';

// Row shapes are checked on the way out of the driver
const CourseMatchRow = z.object({ title: z.string(), similarity: z.number() });

const ChunkHitRow = z.object({
  content: z.string(),
  course_title: z.string(),
  lesson_number: z.number().int().nullable(),
  chunk_index: z.number().int(),
  similarity: z.number(),
});

const TitleRow = z.object({ title: z.string() });

const CountRow = z.object({ count: z.number().int() });

const CourseRow = z.object({
  title: z.string(),
  instructor: z.string().nullable(),
  course_link: z.string().nullable(),
});

const LessonRow = z.object({
  lesson_number: z.number().int(),
  title: z.string(),
  lesson_link: z.string().nullable(),
});

const LessonLinkRow = z.object({ lesson_link: z.string().nullable() });

export interface PgVectorStoreOptions {
  db: Database;
  embed: EmbedFn;
  /** Minimum cosine similarity for a course reference to resolve */
  courseMatchThreshold: number;
}

/**
 * Translate a search filter into a WHERE clause over course_chunks.
 */
export function buildFilterClause(filter: SearchFilter): SQL {
  const courseFilter =
    filter.courseTitle !== undefined
      ? sql`AND ${courseChunks.courseTitle} = ${filter.courseTitle}`
      : sql``;
  const lessonFilter =
    filter.lessonNumber !== undefined
      ? sql`AND ${courseChunks.lessonNumber} = ${filter.lessonNumber}`
      : sql``;

  return sql`WHERE TRUE ${courseFilter} ${lessonFilter}`;
}

/**
 * Course store backed by PostgreSQL + pgvector.
 *
 * Read-only: chunks and catalog rows are written by the ingestion pipeline.
 * Similarity is 1 - cosine distance (`<=>`).
 */
export class PgVectorStore implements VectorStore {
  private readonly db: Database;
  private readonly embed: EmbedFn;
  private readonly courseMatchThreshold: number;

  constructor(options: PgVectorStoreOptions) {
    this.db = options.db;
    this.embed = options.embed;
    this.courseMatchThreshold = options.courseMatchThreshold;
  }

  async resolveCourseName(queryText: string): Promise<string | null> {
    const vectorLiteral = await this.queryVector(queryText);

    const rows = await this.run(
      'Course resolution',
      CourseMatchRow,
      sql`
        SELECT
          ${courseCatalog.title} AS title,
          1 - (${courseCatalog.embedding} <=> ${vectorLiteral}::vector) AS similarity
        FROM ${courseCatalog}
        ORDER BY ${courseCatalog.embedding} <=> ${vectorLiteral}::vector
        LIMIT 1
      `
    );

    const best = rows[0];
    if (!best || best.similarity < this.courseMatchThreshold) {
      console.log(
        `[Search] No course matched "${queryText}" (best similarity: ${best ? best.similarity.toFixed(3) : 'n/a'})`
      );
      return null;
    }
    return best.title;
  }

  async search(queryText: string, filter: SearchFilter, topK: number): Promise<SearchResult> {
    const vectorLiteral = await this.queryVector(queryText);

    const rows = await this.run(
      'Chunk search',
      ChunkHitRow,
      sql`
        SELECT
          ${courseChunks.content} AS content,
          ${courseChunks.courseTitle} AS course_title,
          ${courseChunks.lessonNumber} AS lesson_number,
          ${courseChunks.chunkIndex} AS chunk_index,
          1 - (${courseChunks.embedding} <=> ${vectorLiteral}::vector) AS similarity
        FROM ${courseChunks}
        ${buildFilterClause(filter)}
        ORDER BY ${courseChunks.embedding} <=> ${vectorLiteral}::vector, ${courseChunks.chunkIndex}
        LIMIT ${topK}
      `
    );

    return rows.map((r) => ({
      content: r.content,
      courseTitle: r.course_title,
      lessonNumber: r.lesson_number,
      chunkIndex: r.chunk_index,
      score: r.similarity,
    }));
  }

  async listCourseTitles(): Promise<string[]> {
    const rows = await this.run(
      'Course listing',
      TitleRow,
      sql`SELECT ${courseCatalog.title} AS title FROM ${courseCatalog} ORDER BY ${courseCatalog.title}`
    );
    return rows.map((r) => r.title);
  }

  async getCourseCount(): Promise<number> {
    const rows = await this.run(
      'Course count',
      CountRow,
      sql`SELECT COUNT(*)::int AS count FROM ${courseCatalog}`
    );
    return rows[0]?.count ?? 0;
  }

  async getCourseOutline(courseTitle: string): Promise<CourseOutline | null> {
    const courses = await this.run(
      'Course outline',
      CourseRow,
      sql`
        SELECT
          ${courseCatalog.title} AS title,
          ${courseCatalog.instructor} AS instructor,
          ${courseCatalog.courseLink} AS course_link
        FROM ${courseCatalog}
        WHERE ${courseCatalog.title} = ${courseTitle}
      `
    );

    const course = courses[0];
    if (!course) {
      return null;
    }

    const lessons = await this.run(
      'Lesson listing',
      LessonRow,
      sql`
        SELECT
          ${courseLessons.lessonNumber} AS lesson_number,
          ${courseLessons.title} AS title,
          ${courseLessons.lessonLink} AS lesson_link
        FROM ${courseLessons}
        WHERE ${courseLessons.courseTitle} = ${courseTitle}
        ORDER BY ${courseLessons.lessonNumber}
      `
    );

    return {
      title: course.title,
      instructor: course.instructor,
      courseLink: course.course_link,
      lessons: lessons.map((l) => ({
        lessonNumber: l.lesson_number,
        title: l.title,
        lessonLink: l.lesson_link,
      })),
    };
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    const rows = await this.run(
      'Lesson link lookup',
      LessonLinkRow,
      sql`
        SELECT ${courseLessons.lessonLink} AS lesson_link
        FROM ${courseLessons}
        WHERE ${courseLessons.courseTitle} = ${courseTitle}
          AND ${courseLessons.lessonNumber} = ${lessonNumber}
      `
    );
    return rows[0]?.lesson_link ?? null;
  }

  private async queryVector(text: string): Promise<string> {
    try {
      return formatVectorLiteral(await this.embed(text));
    } catch (error) {
      console.error('[Search] Embedding failed:', errorMessage(error));
      throw new StoreUnavailableError(`Could not embed query: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async run<TRow>(
    label: string,
    rowSchema: z.ZodType<TRow, z.ZodTypeDef, unknown>,
    query: SQL
  ): Promise<TRow[]> {
    try {
      const result = await this.db.execute(query);
      return z.array(rowSchema).parse(result.rows);
    } catch (error) {
      console.error(`[Search] ${label} failed:`, errorMessage(error));
      throw new StoreUnavailableError(`${label} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
