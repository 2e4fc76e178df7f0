// lib/education/session.ts
import { TtlCache, type Clock } from "@/lib/education/cache";
import { loadSettings, type EducationSettings } from "@/lib/education/settings";
import { createSupabaseExecutor, type QueryExecutor, type QueryResult } from "@/lib/education/warehouse";

export type SessionOptions = {
  executor: QueryExecutor;
  settings: EducationSettings;
  now?: Clock;
};

/**
 * Everything one viewer's session shares: the executor and two query caches.
 * Catalog lookups (which relations exist) live on the long metadata TTL;
 * data queries on the short one. Nothing here is shared between sessions,
 * so a schema change is picked up by the next session at the latest.
 */
export class EducationSession {
  readonly settings: EducationSettings;
  private readonly executor: QueryExecutor;
  private readonly metadataCache: TtlCache<QueryResult>;
  private readonly queryCache: TtlCache<QueryResult>;

  constructor(readonly id: string, opts: SessionOptions) {
    const now = opts.now ?? Date.now;
    this.settings = opts.settings;
    this.executor = opts.executor;
    this.metadataCache = new TtlCache<QueryResult>(opts.settings.metadataTtlMs, now);
    this.queryCache = new TtlCache<QueryResult>(opts.settings.queryTtlMs, now);
  }

  /** Catalog query, memoized on the metadata TTL. */
  metadata(sql: string): Promise<QueryResult> {
    return this.metadataCache.getOrLoad(sql, () => this.executor(sql));
  }

  /** Data query, memoized on the query TTL. */
  query(sql: string): Promise<QueryResult> {
    return this.queryCache.getOrLoad(sql, () => this.executor(sql));
  }

  /** Relation name qualified with the configured schema. */
  relation(name: string): string {
    return `${this.settings.schema}.${name}`;
  }
}

type Slot = { session: EducationSession; expiresAt: number };

export const MAX_SESSIONS = 500;

/**
 * Sessions by id. Idle sessions expire after `idleMs` and start over with
 * empty caches. At most `maxSessions` are held; the least recently used one
 * is evicted first.
 */
export class SessionRegistry {
  private slots = new Map<string, Slot>();

  constructor(
    private readonly create: (id: string) => EducationSession,
    private readonly idleMs: number,
    private readonly now: Clock = Date.now,
    private readonly maxSessions = MAX_SESSIONS
  ) {}

  get(id: string): EducationSession {
    const t = this.now();
    for (const [key, slot] of this.slots) {
      if (slot.expiresAt <= t) this.slots.delete(key);
    }

    const existing = this.slots.get(id);
    const session = existing?.session ?? this.create(id);
    // re-insert so Map order is least recently used first
    this.slots.delete(id);
    this.slots.set(id, { session, expiresAt: t + this.idleMs });

    for (const key of this.slots.keys()) {
      if (this.slots.size <= this.maxSessions) break;
      this.slots.delete(key);
    }
    return session;
  }

  get size() {
    return this.slots.size;
  }
}

export const SESSION_HEADER = "x-session-id";
export const DEFAULT_SESSION_ID = "default";

let _registry: SessionRegistry | null = null;

function createRegistry(): SessionRegistry {
  const settings = loadSettings();
  const executor = createSupabaseExecutor();
  return new SessionRegistry(
    (id) => new EducationSession(id, { executor, settings }),
    settings.metadataTtlMs
  );
}

/** Session for a request, keyed by the `x-session-id` header. */
export function sessionFor(req: Request): EducationSession {
  if (!_registry) _registry = createRegistry();
  const id = (req.headers.get(SESSION_HEADER) ?? "").trim() || DEFAULT_SESSION_ID;
  return _registry.get(id);
}
