/**
 * Session store
 *
 * The agent runtime owns the real discussion sessions; the core only reads
 * their progress and reaps them. `InMemorySessionStore` stands in for the
 * runtime in tests and the demo.
 */

import { nanoid } from "nanoid";
import { DISCUSSION_ERROR_CODES, PlanningError } from "../core/errors.js";

export type SessionStatus = "active" | "completed" | "dissolved" | "failed" | "force_cleaned";

/** Statuses after which a session does no more work */
export const TERMINAL_SESSION_STATUSES: ReadonlySet<SessionStatus> = new Set([
  "completed",
  "dissolved",
  "failed",
]);

export interface SessionProgress {
  id: string;
  participants: readonly string[];
  iteration: number;
  maxIterations: number;
  /** In [0, 1] */
  quality: number;
  status: SessionStatus;
  /** Epoch ms */
  createdAt: number;
  metadata?: Record<string, unknown>;
}

export interface SessionStore {
  /** Ids of live sessions that have not been dissolved or force-cleaned */
  listActive(): Promise<string[]>;
  getProgress(id: string): Promise<SessionProgress | undefined>;
  getStatus(id: string): Promise<SessionStatus | undefined>;
  /** Dissolve a session; false when the store does not know it */
  completeSession(id: string): Promise<boolean>;
  forceUpdateStatus(id: string, status: SessionStatus): Promise<void>;
  removeSession(id: string): Promise<void>;
}

export interface CreateSessionInput {
  participants: readonly string[];
  maxIterations?: number;
  createdAt: number;
  metadata?: Record<string, unknown>;
}

export interface SessionUpdate {
  iteration?: number;
  quality?: number;
  status?: SessionStatus;
}

const DEFAULT_MAX_ITERATIONS = 5;

/**
 * Keeps live sessions in one map and dissolved/removed ones in an archive,
 * so the final status stays readable after the session is gone.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly live = new Map<string, SessionProgress>();
  private readonly archive = new Map<string, SessionProgress>();

  createSession(input: CreateSessionInput): SessionProgress {
    const session: SessionProgress = {
      id: `session_${nanoid(10)}`,
      participants: [...input.participants],
      iteration: 0,
      maxIterations: input.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      quality: 0,
      status: "active",
      createdAt: input.createdAt,
      metadata: input.metadata,
    };
    this.live.set(session.id, session);
    return { ...session };
  }

  /**
   * Move a live session forward; the runtime's side of the protocol
   */
  advance(id: string, update: SessionUpdate): SessionProgress {
    const session = this.live.get(id);
    if (!session) {
      throw new PlanningError(DISCUSSION_ERROR_CODES.UNKNOWN_SESSION, `Unknown session: ${id}`);
    }
    const next: SessionProgress = {
      ...session,
      iteration: update.iteration ?? session.iteration,
      quality: update.quality ?? session.quality,
      status: update.status ?? session.status,
    };
    this.live.set(id, next);
    return { ...next };
  }

  async listActive(): Promise<string[]> {
    return [...this.live.values()]
      .filter((session) => session.status !== "dissolved" && session.status !== "force_cleaned")
      .map((session) => session.id);
  }

  async getProgress(id: string): Promise<SessionProgress | undefined> {
    const session = this.live.get(id) ?? this.archive.get(id);
    return session ? { ...session } : undefined;
  }

  async getStatus(id: string): Promise<SessionStatus | undefined> {
    return (this.live.get(id) ?? this.archive.get(id))?.status;
  }

  async completeSession(id: string): Promise<boolean> {
    const session = this.live.get(id);
    if (!session) return false;
    this.live.delete(id);
    this.archive.set(id, { ...session, status: "dissolved" });
    return true;
  }

  async forceUpdateStatus(id: string, status: SessionStatus): Promise<void> {
    const session = this.live.get(id) ?? this.archive.get(id);
    if (!session) {
      throw new PlanningError(DISCUSSION_ERROR_CODES.UNKNOWN_SESSION, `Unknown session: ${id}`);
    }
    const target = this.live.has(id) ? this.live : this.archive;
    target.set(id, { ...session, status });
  }

  async removeSession(id: string): Promise<void> {
    const session = this.live.get(id);
    if (!session) return;
    this.live.delete(id);
    if (!this.archive.has(id)) this.archive.set(id, session);
  }

  /** Every session ever created, live ones first */
  all(): SessionProgress[] {
    return [...this.live.values(), ...this.archive.values()].map((session) => ({ ...session }));
  }

  get liveCount(): number {
    return this.live.size;
  }
}
