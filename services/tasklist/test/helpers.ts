import { PGlite } from '@electric-sql/pglite';
import type { QueryResultRow } from 'pg';
import { vi, type Mock } from 'vitest';
import type { Session, SessionFactory } from '../src/db/connection';
import type { Logger } from '../src/logger';

export interface SessionStats {
  opened: number;
  ended: number;
}

/** Opens "sessions" over one in-process PGlite database, counting opens and ends. */
export function pgliteSessions(db: PGlite): { factory: SessionFactory; stats: SessionStats } {
  const stats: SessionStats = { opened: 0, ended: 0 };
  const factory: SessionFactory = async () => {
    stats.opened += 1;
    const session: Session = {
      async query<R extends QueryResultRow>(text: string, values?: unknown[]) {
        const res = await db.query<R>(text, values);
        return res.rows;
      },
      async end() {
        stats.ended += 1;
      },
    };
    return session;
  };
  return { factory, stats };
}

export type FakeSession = Session & { end: Mock<() => Promise<void>> };

export function fakeSession(query: Session['query']): FakeSession {
  return { query, end: vi.fn(async (): Promise<void> => undefined) };
}

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/** A sleep that advances a virtual clock instead of waiting. */
export function virtualClock() {
  const clock: { now: number; sleeps: number[] } = { now: 0, sleeps: [] };
  const sleep = async (ms: number) => {
    clock.sleeps.push(ms);
    clock.now += ms;
  };
  return { clock, sleep };
}

export const noSleep = async () => undefined;
