import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { CourseAssistant, createCourseAssistant, createToolRegistry } from '@/lib/assistant';
import { ResponseGenerator } from '@/lib/ai/response-generator';
import type { LLMClient, LLMReply } from '@/lib/ai/types';
import { loadConfig } from '@/lib/config';
import { ConfigError, LLMTransportError, QueryFailedError, StoreUnavailableError } from '@/lib/errors';
import type { InMemoryVectorStore } from '@/lib/search/memory-store';
import { SessionManager } from '@/lib/sessions/session-manager';
import { InMemorySessionStore } from '@/lib/sessions/session-store';
import { buildCourseStore, MCP_COURSE, RAG_COURSE } from '../../fixtures/courses';
import { ScriptedLLM } from '../../fixtures/scripted-llm';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function searchCall(input: Record<string, unknown>): LLMReply {
  return {
    type: 'tool_calls',
    text: '',
    calls: [{ id: 'call-1', name: 'search_course_content', input }],
  };
}

function createAssistant(
  store: InMemoryVectorStore,
  llm: LLMClient,
  sessionStore = new InMemorySessionStore()
) {
  const sessions = new SessionManager({ maxHistoryTurns: 2, store: sessionStore });
  const generator = new ResponseGenerator({
    llm,
    tools: createToolRegistry(store, 5),
    maxToolRounds: 1,
  });
  return { assistant: new CourseAssistant({ generator, sessions, store }), sessions };
}

describe('CourseAssistant', () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = await buildCourseStore();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('cites exactly the lessons a filtered search retrieved', async () => {
    const llm = new ScriptedLLM([
      searchCall({ query: 'server', courseName: 'MCP', lessonNumber: 1 }),
      { type: 'answer', text: 'Lesson 1 introduces MCP servers.' },
    ]);
    const { assistant, sessions } = createAssistant(store, llm);

    const result = await assistant.query('What is covered in lesson 1 of the MCP course?');

    expect(result.answer).toBe('Lesson 1 introduces MCP servers.');
    expect(result.sources).toEqual([
      { courseTitle: MCP_COURSE, lessonNumber: 1, lessonLink: 'https://courses.example.com/mcp/1' },
    ]);
    expect(await sessions.getHistory(result.sessionId)).toEqual([
      {
        userMessage: 'What is covered in lesson 1 of the MCP course?',
        assistantMessage: 'Lesson 1 introduces MCP servers.',
        sources: result.sources,
      },
    ]);
  });

  it('returns no sources when the course cannot be resolved', async () => {
    const llm = new ScriptedLLM([
      searchCall({ query: 'anything', courseName: 'Nonexistent Course' }),
      { type: 'answer', text: 'I could not find that course. Which one do you mean?' },
    ]);
    const { assistant } = createAssistant(store, llm);

    const result = await assistant.query('Tell me about the nonexistent course');

    expect(result.sources).toEqual([]);
    expect(llm.requests[1].messages[2]).toEqual({
      role: 'tool',
      results: [
        {
          id: 'call-1',
          name: 'search_course_content',
          output: "No course found matching 'Nonexistent Course'.",
        },
      ],
    });
  });

  it('answers conversational queries without tools and records the turn', async () => {
    const llm = new ScriptedLLM([{ type: 'answer', text: "You're welcome!" }]);
    const { assistant, sessions } = createAssistant(store, llm);

    const result = await assistant.query('thanks!');

    expect(result).toEqual({ answer: "You're welcome!", sources: [], sessionId: result.sessionId });
    expect(await sessions.getHistory(result.sessionId)).toHaveLength(1);
  });

  it('passes earlier turns of the session to the next query', async () => {
    const llm = new ScriptedLLM([
      { type: 'answer', text: 'first answer' },
      { type: 'answer', text: 'second answer' },
    ]);
    const { assistant } = createAssistant(store, llm);

    const first = await assistant.query('first question');
    const second = await assistant.query('second question', first.sessionId);

    expect(second.sessionId).toBe(first.sessionId);
    expect(llm.requests[1].messages).toEqual([
      { role: 'user', content: 'first question' },
      { role: 'assistant', content: 'first answer' },
      { role: 'user', content: 'Answer this question about course materials: second question' },
    ]);
  });

  it('adopts a session id it has not seen before', async () => {
    const llm = new ScriptedLLM([{ type: 'answer', text: 'hi' }]);
    const { assistant, sessions } = createAssistant(store, llm);

    const result = await assistant.query('hello', 'client-session');

    expect(result.sessionId).toBe('client-session');
    expect(await sessions.getHistory('client-session')).toHaveLength(1);
  });

  it('fails the query without recording a turn when the store is down', async () => {
    vi.spyOn(store, 'search').mockRejectedValue(new StoreUnavailableError('index offline'));
    const llm = new ScriptedLLM([
      searchCall({ query: 'server' }),
      { type: 'answer', text: 'unused' },
    ]);
    const { assistant, sessions } = createAssistant(store, llm);

    const error = await assistant.query('What is a server?', 'session-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryFailedError);
    expect((error as QueryFailedError).message).toBe('Could not complete the request.');
    expect((error as QueryFailedError).cause).toBeInstanceOf(StoreUnavailableError);
    expect(llm.requests).toHaveLength(1);
    expect(await sessions.getHistory('session-1')).toEqual([]);
  });

  it('fails the query when the LLM cannot be reached', async () => {
    const llm = new ScriptedLLM([
      () => {
        throw new LLMTransportError('provider offline');
      },
    ]);
    const { assistant, sessions } = createAssistant(store, llm);

    await expect(assistant.query('hello', 'session-2')).rejects.toBeInstanceOf(QueryFailedError);
    expect(await sessions.hasSession('session-2')).toBe(false);
  });

  it('stores nothing when a query without a session id fails', async () => {
    const sessionStore = new InMemorySessionStore();
    const set = vi.spyOn(sessionStore, 'set');
    const llm = new ScriptedLLM([
      () => {
        throw new LLMTransportError('provider offline');
      },
    ]);
    const { assistant } = createAssistant(store, llm, sessionStore);

    for (let i = 0; i < 3; i++) {
      await expect(assistant.query('hello')).rejects.toBeInstanceOf(QueryFailedError);
    }

    expect(set).not.toHaveBeenCalled();
  });

  it('creates the session history with the first answered turn', async () => {
    const sessionStore = new InMemorySessionStore();
    const set = vi.spyOn(sessionStore, 'set');
    const { assistant } = createAssistant(store, new ScriptedLLM([{ type: 'answer', text: 'hi' }]), sessionStore);

    const result = await assistant.query('hello');

    expect(set).toHaveBeenCalledTimes(1);
    expect(set.mock.calls[0][0]).toBe(result.sessionId);
    expect(await sessionStore.get(result.sessionId)).toHaveLength(1);
  });

  it('does not hold the session lock while the LLM is working', async () => {
    const llmStarted = deferred();
    const release = deferred<LLMReply>();
    const llm: LLMClient = {
      complete() {
        llmStarted.resolve();
        return release.promise;
      },
    };
    const { assistant, sessions } = createAssistant(store, llm);

    const pending = assistant.query('slow question', 'session-3');
    await llmStarted.promise;

    await sessions.appendTurn('session-3', 'side question', 'side answer', []);
    expect((await sessions.getHistory('session-3')).map((t) => t.userMessage)).toEqual(['side question']);

    release.resolve({ type: 'answer', text: 'slow answer' });
    await pending;

    expect((await sessions.getHistory('session-3')).map((t) => t.userMessage)).toEqual([
      'side question',
      'slow question',
    ]);
  });

  it('keeps sources of concurrent queries apart', async () => {
    const llm: LLMClient = {
      async complete(request) {
        const last = request.messages[request.messages.length - 1];
        if (last.role === 'tool') {
          return { type: 'answer', text: 'done' };
        }
        const query = last.role === 'user' && last.content.includes('vector') ? 'vector' : 'server';
        const courseName = query === 'vector' ? 'vector databases' : 'MCP';
        return searchCall({ query, courseName, lessonNumber: query === 'vector' ? 2 : 1 });
      },
    };
    const { assistant } = createAssistant(store, llm);

    const [mcp, rag] = await Promise.all([
      assistant.query('servers please'),
      assistant.query('vector indexes please'),
    ]);

    expect(mcp.sources.map((s) => [s.courseTitle, s.lessonNumber])).toEqual([[MCP_COURSE, 1]]);
    expect(rag.sources.map((s) => [s.courseTitle, s.lessonNumber])).toEqual([[RAG_COURSE, 2]]);
  });

  describe('getCourseAnalytics', () => {
    it('reports the catalog size and titles', async () => {
      const { assistant } = createAssistant(store, new ScriptedLLM([]));

      expect(await assistant.getCourseAnalytics()).toEqual({
        totalCourses: 2,
        courseTitles: [MCP_COURSE, RAG_COURSE],
      });
    });

    it('fails when the catalog cannot be read', async () => {
      vi.spyOn(store, 'getCourseCount').mockRejectedValue(new StoreUnavailableError('index offline'));
      const { assistant } = createAssistant(store, new ScriptedLLM([]));

      await expect(assistant.getCourseAnalytics()).rejects.toBeInstanceOf(QueryFailedError);
    });
  });
});

describe('createCourseAssistant', () => {
  it('requires an API key', () => {
    expect(() => createCourseAssistant(loadConfig({ DATABASE_URL: 'postgres://localhost/courses' }))).toThrow(
      ConfigError
    );
  });

  it('requires a database URL unless a store is supplied', async () => {
    const config = loadConfig({ OPENROUTER_API_KEY: 'test-api-key' });

    expect(() => createCourseAssistant(config)).toThrow('Missing configuration: DATABASE_URL');
    expect(createCourseAssistant(config, { store: await buildCourseStore() })).toBeInstanceOf(
      CourseAssistant
    );
  });
});
