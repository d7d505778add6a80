import { z } from 'zod';

import { buildSearchFilter, describeFilter } from '@/lib/search/filter';
import type { SearchResult, VectorStore } from '@/lib/search/types';
import type { Tool, ToolContext } from './types';

export const COURSE_SEARCH_TOOL_NAME = 'search_course_content';

export const CourseSearchInputSchema = z.object({
  query: z.string().min(1).describe('What to search for in the course content'),
  courseName: z
    .string()
    .nullish()
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
  lessonNumber: z
    .number()
    .int()
    .nullish()
    .describe('Specific lesson number to search within (e.g. 1, 2, 3)'),
});

export type CourseSearchInput = z.infer<typeof CourseSearchInputSchema>;

/**
 * Label a chunk with its course and lesson, e.g. "[Intro to X - Lesson 3]".
 * A lesson with a link becomes a markdown link: "[[Intro to X - Lesson 3]](url)".
 */
export function formatHitHeader(
  courseTitle: string,
  lessonNumber: number | null,
  lessonLink: string | null = null
): string {
  if (lessonNumber === null) {
    return `[${courseTitle}]`;
  }
  const label = `[${courseTitle} - Lesson ${lessonNumber}]`;
  return lessonLink ? `[${label}](${lessonLink})` : label;
}

/**
 * Semantic search over course chunks, optionally scoped to one course and lesson.
 *
 * The course reference is resolved against the catalog first; an unresolved
 * reference is reported back to the model instead of silently searching everything.
 */
export class CourseSearchTool implements Tool<CourseSearchInput> {
  readonly name = COURSE_SEARCH_TOOL_NAME;
  readonly description =
    'Search course materials with smart course name matching and lesson filtering';
  readonly inputSchema = CourseSearchInputSchema;

  constructor(
    private readonly store: VectorStore,
    private readonly topK: number
  ) {}

  async execute(input: CourseSearchInput, context: ToolContext): Promise<string> {
    let courseTitle: string | null = null;

    if (input.courseName) {
      courseTitle = await this.store.resolveCourseName(input.courseName);
      if (!courseTitle) {
        return `No course found matching '${input.courseName}'.`;
      }
    }

    const filter = buildSearchFilter(courseTitle, input.lessonNumber);
    const results = await this.store.search(input.query, filter, this.topK);

    console.log(`[Search] ${results.length} results for query${describeFilter(filter)}`);

    if (results.length === 0) {
      return `No relevant content found${describeFilter(filter)}.`;
    }

    await this.recordSources(results, context);
    return results
      .map((hit) => {
        const lessonLink = context.sources.get(hit)?.lessonLink ?? null;
        return `${formatHitHeader(hit.courseTitle, hit.lessonNumber, lessonLink)}\n${hit.content}`;
      })
      .join('\n\n');
  }

  private async recordSources(results: SearchResult, context: ToolContext): Promise<void> {
    for (const hit of results) {
      const source = { courseTitle: hit.courseTitle, lessonNumber: hit.lessonNumber };
      if (context.sources.has(source)) {
        continue;
      }

      const lessonLink =
        hit.lessonNumber === null
          ? null
          : await this.store.getLessonLink(hit.courseTitle, hit.lessonNumber);
      context.sources.add({ ...source, lessonLink });
    }
  }
}
