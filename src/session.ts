/**
 * Helpers over SessionRecords.
 */

import type {
  MessageRole,
  ReconciledMessage,
  SessionRecord,
} from "./types.ts";

const AGENT_ROLES: ReadonlySet<string> = new Set(["bot", "assistant"]);

export function isAgentRole(role: string): boolean {
  return AGENT_ROLES.has(role);
}

/** Agent roles map to "assistant"; everything else is user-side. */
export function normalizeSessionRole(role: string): MessageRole {
  return isAgentRole(role) ? "assistant" : "user";
}

/**
 * Execution references in first-appearance order, without repeats. The
 * session-level id, when it isn't already listed, goes last: it names the
 * most recent execution.
 */
export function sessionExecutionRefs(session: SessionRecord): string[] {
  const refs: string[] = [];
  const seen = new Set<string>();
  const add = (ref: string | undefined) => {
    if (ref && !seen.has(ref)) {
      seen.add(ref);
      refs.push(ref);
    }
  };

  for (const entry of session.entries) add(entry.executionRef);
  add(session.executionId);
  return refs;
}

/**
 * The single log a session points at: its own executionId, else the most
 * recent per-entry reference.
 */
export function sessionExecutionRef(session: SessionRecord): string | undefined {
  if (session.executionId) return session.executionId;
  for (let i = session.entries.length - 1; i >= 0; i--) {
    const ref = session.entries[i].executionRef;
    if (ref) return ref;
  }
  return undefined;
}

/** Session text as-is, with roles normalized. */
export function toReconciledMessages(session: SessionRecord): ReconciledMessage[] {
  return session.entries.map((e) => ({
    role: normalizeSessionRole(e.role),
    content: e.text,
  }));
}
