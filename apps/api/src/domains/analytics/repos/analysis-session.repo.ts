import type { AnalysisSession, ServiceRecord } from '../analytics.types.js';

// ---------------------------------------------------------------------------
// Analysis Session Repository
// In-memory store of loaded extracts. A session is replaced wholesale; its
// filter cache is keyed by source hash and dropped whenever the session is
// saved again or deleted.
//
// Both maps are kept in least-recently-used order: a session idle for longer
// than the TTL is discarded, the oldest session makes room when the store is
// full, and each session keeps at most `maxCachedFilters` filter results.
// ---------------------------------------------------------------------------

const DEFAULT_SESSION_TTL_MINUTES = 60;
const DEFAULT_MAX_SESSIONS = 20;
const DEFAULT_MAX_CACHED_FILTERS = 100;

export interface AnalysisSessionRepositoryOptions {
  /** Idle time after which a session is discarded. */
  sessionTtlMinutes?: number;
  maxSessions?: number;
  /** Per session. */
  maxCachedFilters?: number;
  now?: () => number; // injectable for testing
}

interface StoredSession {
  session: AnalysisSession;
  lastAccessedAt: number;
}

export function createAnalysisSessionRepository(opts: AnalysisSessionRepositoryOptions = {}) {
  const ttlMs = (opts.sessionTtlMinutes ?? DEFAULT_SESSION_TTL_MINUTES) * 60_000;
  const maxSessions = opts.maxSessions ?? DEFAULT_MAX_SESSIONS;
  const maxCachedFilters = opts.maxCachedFilters ?? DEFAULT_MAX_CACHED_FILTERS;
  const now = opts.now ?? Date.now;

  const sessions = new Map<string, StoredSession>();
  const filterCache = new Map<string, Map<string, readonly ServiceRecord[]>>();

  function cacheKey(session: AnalysisSession, predicateKey: string): string {
    return `${session.sourceHash}:${predicateKey}`;
  }

  function drop(sessionId: string): boolean {
    filterCache.delete(sessionId);
    return sessions.delete(sessionId);
  }

  function evictExpired(): void {
    const cutoff = now() - ttlMs;
    for (const [sessionId, stored] of sessions) {
      if (stored.lastAccessedAt > cutoff) break;
      drop(sessionId);
    }
  }

  function touch(sessionId: string, session: AnalysisSession): void {
    sessions.delete(sessionId);
    sessions.set(sessionId, { session, lastAccessedAt: now() });
  }

  return {
    findById(sessionId: string): AnalysisSession | undefined {
      evictExpired();
      const stored = sessions.get(sessionId);
      if (!stored) return undefined;
      touch(sessionId, stored.session);
      return stored.session;
    },

    /**
     * Inserts or replaces a session. Any cached filter results for it are
     * discarded; a new session evicts the least recently used one when full.
     */
    save(session: AnalysisSession): AnalysisSession {
      evictExpired();
      drop(session.id);
      for (const sessionId of sessions.keys()) {
        if (sessions.size < maxSessions) break;
        drop(sessionId);
      }
      touch(session.id, session);
      return session;
    },

    delete(sessionId: string): boolean {
      return drop(sessionId);
    },

    count(): number {
      evictExpired();
      return sessions.size;
    },

    getCachedFilter(
      session: AnalysisSession,
      predicateKey: string,
    ): readonly ServiceRecord[] | undefined {
      const entries = filterCache.get(session.id);
      const key = cacheKey(session, predicateKey);
      const records = entries?.get(key);
      if (entries && records) {
        entries.delete(key);
        entries.set(key, records);
      }
      return records;
    },

    cacheFilter(
      session: AnalysisSession,
      predicateKey: string,
      records: readonly ServiceRecord[],
    ): void {
      let entries = filterCache.get(session.id);
      if (!entries) {
        entries = new Map();
        filterCache.set(session.id, entries);
      }
      entries.set(cacheKey(session, predicateKey), records);
      for (const key of entries.keys()) {
        if (entries.size <= maxCachedFilters) break;
        entries.delete(key);
      }
    },

    cachedFilterCount(sessionId: string): number {
      return filterCache.get(sessionId)?.size ?? 0;
    },
  };
}

export type AnalysisSessionRepository = ReturnType<typeof createAnalysisSessionRepository>;
