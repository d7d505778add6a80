// Citation attached to an answer: one course/lesson pair a search actually retrieved
export type Source = {
  courseTitle: string;
  lessonNumber: number | null;
  lessonLink: string | null;
};

// What the request-handling layer receives for each question
export type QueryResponse = {
  answer: string;
  sources: Source[];
  sessionId: string;
};

export type CourseAnalytics = {
  totalCourses: number;
  courseTitles: string[];
};

export type Lesson = {
  lessonNumber: number;
  title: string;
  lessonLink: string | null;
};

// Catalog entry as exposed by the outline tool
export type CourseOutline = {
  title: string;
  instructor: string | null;
  courseLink: string | null;
  lessons: Lesson[];
};
