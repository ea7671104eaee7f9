/**
 * Completion heuristic for discussion sessions.
 *
 * A session counts as finished on the first signal that holds, checked in
 * this order: reported completion, iteration budget spent, quality reached,
 * terminal store status, soft timeout, hard timeout. A session whose
 * progress cannot be read is also finished.
 */

import { DISCUSSION_DEFAULTS } from "../core/constants.js";
import type { DiscussionConfig } from "../core/config.js";
import { TERMINAL_SESSION_STATUSES, type SessionProgress, type SessionStatus } from "./store.js";

export interface CompletionPolicy {
  qualityThreshold: number;
  softTimeoutMs: number;
  /** Iterations a session must have run before the soft timeout applies */
  softTimeoutMinIterations: number;
  hardTimeoutMs: number;
}

export type CompletionReason =
  | "status_completed"
  | "max_iterations"
  | "quality"
  | "terminal_status"
  | "soft_timeout"
  | "hard_timeout"
  | "progress_unavailable";

export type SessionDecision =
  | { completed: true; reason: CompletionReason }
  | { completed: false };

export const DEFAULT_COMPLETION_POLICY: CompletionPolicy = {
  qualityThreshold: DISCUSSION_DEFAULTS.qualityThreshold,
  softTimeoutMs: DISCUSSION_DEFAULTS.softTimeoutMs,
  softTimeoutMinIterations: DISCUSSION_DEFAULTS.softTimeoutMinIterations,
  hardTimeoutMs: DISCUSSION_DEFAULTS.hardTimeoutMs,
};

export function policyFromConfig(
  discussion: Pick<
    DiscussionConfig,
    "qualityThreshold" | "softTimeoutMs" | "softTimeoutMinIterations" | "hardTimeoutMs"
  >
): CompletionPolicy {
  return {
    qualityThreshold: discussion.qualityThreshold,
    softTimeoutMs: discussion.softTimeoutMs,
    softTimeoutMinIterations: discussion.softTimeoutMinIterations,
    hardTimeoutMs: discussion.hardTimeoutMs,
  };
}

/** Reasons that mean the participants actually agreed */
export const CONSENSUS_REASONS: ReadonlySet<CompletionReason> = new Set([
  "status_completed",
  "quality",
]);

export function classifySession(
  progress: SessionProgress | undefined,
  storeStatus: SessionStatus | undefined,
  now: number,
  policy: CompletionPolicy = DEFAULT_COMPLETION_POLICY
): SessionDecision {
  if (!progress) return { completed: true, reason: "progress_unavailable" };

  if (progress.status === "completed") return { completed: true, reason: "status_completed" };
  if (progress.iteration >= progress.maxIterations) {
    return { completed: true, reason: "max_iterations" };
  }
  if (progress.quality >= policy.qualityThreshold) return { completed: true, reason: "quality" };
  if (storeStatus !== undefined && TERMINAL_SESSION_STATUSES.has(storeStatus)) {
    return { completed: true, reason: "terminal_status" };
  }

  const elapsed = now - progress.createdAt;
  if (elapsed > policy.softTimeoutMs && progress.iteration >= policy.softTimeoutMinIterations) {
    return { completed: true, reason: "soft_timeout" };
  }
  if (elapsed > policy.hardTimeoutMs) return { completed: true, reason: "hard_timeout" };

  return { completed: false };
}
