import { z } from 'zod';

import type { VectorStore } from '@/lib/search/types';
import type { CourseOutline } from '@/types';
import type { Tool } from './types';

export const COURSE_OUTLINE_TOOL_NAME = 'get_course_outline';

export const CourseOutlineInputSchema = z.object({
  courseName: z
    .string()
    .min(1)
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
});

export type CourseOutlineInput = z.infer<typeof CourseOutlineInputSchema>;

export function formatOutline(outline: CourseOutline): string {
  let text = outline.courseLink
    ? `# [${outline.title}](${outline.courseLink})`
    : `# ${outline.title}`;

  text += `\n**Instructor:** ${outline.instructor ?? 'Unknown'}\n`;

  if (outline.lessons.length === 0) {
    return `${text}\n**No lessons found**\n`;
  }

  text += `\n**Lessons (${outline.lessons.length} total):**\n`;
  for (const lesson of outline.lessons) {
    const label = lesson.lessonLink ? `[${lesson.title}](${lesson.lessonLink})` : lesson.title;
    text += `- Lesson ${lesson.lessonNumber}: ${label}\n`;
  }
  return text;
}

/**
 * Course structure lookup: title, link, instructor and lesson list.
 *
 * Matching goes exact title, then substring, then embedding resolution.
 * Outlines come from the catalog, not from retrieved chunks, so no sources
 * are recorded.
 */
export class CourseOutlineTool implements Tool<CourseOutlineInput> {
  readonly name = COURSE_OUTLINE_TOOL_NAME;
  readonly description = 'Get course structure including title, link, and complete lesson list';
  readonly inputSchema = CourseOutlineInputSchema;

  constructor(private readonly store: VectorStore) {}

  async execute(input: CourseOutlineInput): Promise<string> {
    const titles = await this.store.listCourseTitles();
    if (titles.length === 0) {
      return 'No courses found in the system';
    }

    const title = await this.matchTitle(input.courseName, titles);
    const outline = title ? await this.store.getCourseOutline(title) : null;

    if (!outline) {
      return `No course found matching '${input.courseName}'. Available courses: ${titles.join(', ')}`;
    }
    return formatOutline(outline);
  }

  private async matchTitle(courseName: string, titles: string[]): Promise<string | null> {
    const wanted = courseName.toLowerCase();

    const exact = titles.find((t) => t.toLowerCase() === wanted);
    if (exact) {
      return exact;
    }

    const partial = titles.find((t) => t.toLowerCase().includes(wanted));
    if (partial) {
      return partial;
    }

    return this.store.resolveCourseName(courseName);
  }
}
