import type { ResponseGenerator } from '@/lib/ai/response-generator';
import { QueryFailedError, errorMessage } from '@/lib/errors';
import type { VectorStore } from '@/lib/search/types';
import type { SessionManager } from '@/lib/sessions/session-manager';
import { SourceCollector } from '@/lib/sources/source-collector';
import type { CourseAnalytics, QueryResponse } from '@/types';

export interface CourseAssistantDeps {
  generator: ResponseGenerator;
  sessions: SessionManager;
  store: VectorStore;
}

/**
 * Entry point for the request-handling layer: one query in, one answer with
 * its sources and session id out.
 */
export class CourseAssistant {
  constructor(private readonly deps: CourseAssistantDeps) {}

  /**
   * Answer a question, continuing the given session or starting a new one.
   *
   * The turn is recorded only after a complete answer exists. A failed query
   * leaves the session untouched.
   *
   * @throws QueryFailedError when the store or the LLM cannot be reached
   */
  async query(text: string, sessionId?: string): Promise<QueryResponse> {
    const { generator, sessions } = this.deps;
    const id = sessionId ?? sessions.newSessionId();
    const history = await sessions.getHistory(id);
    const context = { sources: new SourceCollector() };

    let answer: string;
    try {
      const result = await generator.generateResponse({ query: text, history, context });
      answer = result.text;
      console.log(
        `[Assistant] Session ${id}: ${result.toolRounds} tool round(s), ${context.sources.size} source(s)`
      );
    } catch (error) {
      console.error(`[Assistant] Query failed for session ${id}:`, errorMessage(error));
      throw new QueryFailedError({ cause: error });
    }

    const sources = context.sources.list();
    await sessions.appendTurn(id, text, answer, sources);

    return { answer, sources, sessionId: id };
  }

  /**
   * @throws QueryFailedError when the catalog cannot be read
   */
  async getCourseAnalytics(): Promise<CourseAnalytics> {
    try {
      const [totalCourses, courseTitles] = await Promise.all([
        this.deps.store.getCourseCount(),
        this.deps.store.listCourseTitles(),
      ]);
      return { totalCourses, courseTitles };
    } catch (error) {
      console.error('[Assistant] Analytics failed:', errorMessage(error));
      throw new QueryFailedError({ cause: error });
    }
  }
}
