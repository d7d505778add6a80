import {
  pgSchema,
  uuid,
  text,
  timestamp,
  integer,
  index,
  uniqueIndex,
  vector,
} from 'drizzle-orm/pg-core';

export const aiSchema = pgSchema('ai');

/**
 * Dimension of openai/text-embedding-3-small, the default embedding model.
 */
export const EMBEDDING_DIMENSIONS = 1536;

// One row per course; the title embedding drives fuzzy course-name resolution
export const courseCatalog = aiSchema.table(
  'course_catalog',
  {
    title: text('title').primaryKey(),
    instructor: text('instructor'),
    courseLink: text('course_link'),
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_course_catalog_embedding').using(
      'hnsw',
      table.embedding.op('vector_cosine_ops')
    ),
  ]
);

export const courseLessons = aiSchema.table(
  'course_lessons',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    courseTitle: text('course_title')
      .notNull()
      .references(() => courseCatalog.title, { onDelete: 'cascade' }),
    lessonNumber: integer('lesson_number').notNull(),
    title: text('title').notNull(),
    lessonLink: text('lesson_link'),
  },
  (table) => [
    uniqueIndex('idx_course_lessons_unique').on(table.courseTitle, table.lessonNumber),
  ]
);

// Written by the ingestion pipeline, read-only here
export const courseChunks = aiSchema.table(
  'course_chunks',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    courseTitle: text('course_title')
      .notNull()
      .references(() => courseCatalog.title, { onDelete: 'cascade' }),
    lessonNumber: integer('lesson_number'),
    chunkIndex: integer('chunk_index').notNull(),
    content: text('content').notNull(),
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
  },
  (table) => [
    index('idx_course_chunks_course_lesson').on(table.courseTitle, table.lessonNumber),
    index('idx_course_chunks_embedding').using(
      'hnsw',
      table.embedding.op('vector_cosine_ops')
    ),
  ]
);
