/**
 * In-process PostgreSQL stand-in for unit tests.
 *
 * Records every query (pool-level and client-level) and answers with the
 * first registered response whose pattern occurs in the SQL text, or an
 * empty result. `_failOn` makes matching queries reject instead.
 */
import { vi } from 'vitest';
import type { DbPool } from '../../src/db/client.js';

export interface MockQueryResult {
  rows: unknown[];
  rowCount: number;
}

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

export type MockPool = DbPool & {
  _queries: RecordedQuery[];
  _setResponse: (pattern: string, response: MockQueryResult) => void;
  _failOn: (pattern: string, error: Error) => void;
  _mockClient: {
    query: ReturnType<typeof vi.fn>;
    release: ReturnType<typeof vi.fn>;
  };
};

export function createMockPool(): MockPool {
  const queries: RecordedQuery[] = [];
  const responses = new Map<string, MockQueryResult>();
  const failures = new Map<string, Error>();

  const answer = async (text: string, values?: unknown[]): Promise<MockQueryResult> => {
    queries.push({ text, values });
    for (const [pattern, error] of failures) {
      if (text.includes(pattern)) throw error;
    }
    for (const [pattern, response] of responses) {
      if (text.includes(pattern)) return response;
    }
    return { rows: [], rowCount: 0 };
  };

  const mockClient = {
    query: vi.fn(answer),
    release: vi.fn(),
  };

  const pool = {
    query: vi.fn(answer),
    connect: vi.fn(async () => mockClient),
    end: vi.fn(async () => {}),
    on: vi.fn(),
    _queries: queries,
    _setResponse: (pattern: string, response: MockQueryResult) => {
      responses.set(pattern, response);
    },
    _failOn: (pattern: string, error: Error) => {
      failures.set(pattern, error);
    },
    _mockClient: mockClient,
  } as unknown as MockPool;

  return pool;
}

/** SQL text of every recorded query, in order. */
export function queryTexts(pool: MockPool): string[] {
  return pool._queries.map((q) => q.text.replace(/\s+/g, ' ').trim());
}
