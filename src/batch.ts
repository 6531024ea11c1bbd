/**
 * Batch reconciliation over workspace session files.
 *
 * One bad session file never stops a batch: it becomes a
 * session_unreadable outcome and the rest carry on.
 */

import { readFile } from "fs/promises";
import type {
  DiscoveredSession,
  ReconcileResult,
  SessionRecord,
  Workspace,
} from "./types.ts";
import type { Reconciler, ReconcileOptions } from "./reconcile.ts";
import { parseSession } from "./workspace.ts";
import { diagnostic } from "./utils/diagnostics.ts";

export interface SessionOutcome extends ReconcileResult {
  /** Decoded project path of the workspace the session belongs to */
  projectPath: string;
  path: string;
  /** Absent when the session file couldn't be read or parsed */
  sessionId?: string;
  title?: string;
}

async function readSession(discovered: DiscoveredSession): Promise<SessionRecord> {
  return parseSession(await readFile(discovered.path, "utf-8"), discovered.path);
}

export async function reconcileWorkspace(
  reconciler: Reconciler,
  workspace: Workspace,
  options: ReconcileOptions = {},
): Promise<SessionOutcome[]> {
  const outcomes: SessionOutcome[] = [];

  for (const discovered of workspace.sessions) {
    const base = { projectPath: workspace.projectPath, path: discovered.path };

    let session: SessionRecord;
    try {
      session = await readSession(discovered);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      outcomes.push({
        ...base,
        title: discovered.title,
        messages: [],
        diagnostics: [diagnostic("session_unreadable", message)],
      });
      continue;
    }

    const result = await reconciler.reconcile(session, options);
    outcomes.push({
      ...base,
      sessionId: session.sessionId,
      // The listing's title is what the IDE shows; the file's is a fallback
      title: discovered.title ?? session.title,
      ...result,
    });
  }

  return outcomes;
}

export async function reconcileWorkspaces(
  reconciler: Reconciler,
  workspaces: Workspace[],
  options: ReconcileOptions = {},
): Promise<SessionOutcome[]> {
  const outcomes: SessionOutcome[] = [];
  for (const workspace of workspaces) {
    outcomes.push(...(await reconcileWorkspace(reconciler, workspace, options)));
  }
  return outcomes;
}
