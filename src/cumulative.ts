/**
 * Cumulative reconstruction.
 *
 * Some sources write execution logs as cumulative snapshots: each log
 * holds the whole conversation up to that point. The latest log that
 * yields anything is therefore the full transcript on its own; earlier
 * logs are only consulted when later ones come up empty.
 */

import { createHash } from "crypto";
import type {
  Diagnostic,
  ExecutionLogIndex,
  ExtractedMessage,
  ReconciledMessage,
  SessionRecord,
} from "./types.ts";
import type { ExtractionConfig } from "./config.ts";
import { loadIndexedLog } from "./log-loader.ts";
import { extractMessages } from "./extract.ts";
import { sessionExecutionRefs, toReconciledMessages } from "./session.ts";
import { diagnostic } from "./utils/diagnostics.ts";

export interface CumulativeOptions {
  includeToolDetail?: boolean;
  extraction?: Partial<ExtractionConfig>;
}

export interface CumulativeResult {
  messages: ReconciledMessage[];
  diagnostics: Diagnostic[];
  /** Which log the messages came from; undefined for the raw-session fallback */
  executionId?: string;
}

/** Tool output travels on the user side of the conversation. */
export function toReconciled(messages: ExtractedMessage[]): ReconciledMessage[] {
  return messages.map((m): ReconciledMessage => ({
    role: m.role === "assistant" ? "assistant" : "user",
    content: m.content,
  }));
}

async function messagesFromLog(
  index: ExecutionLogIndex,
  executionId: string,
  options: CumulativeOptions,
  diagnostics: Diagnostic[],
): Promise<ExtractedMessage[]> {
  const loaded = await loadIndexedLog(index, executionId);
  if (!loaded.ok) {
    diagnostics.push(loaded.diagnostic);
    return [];
  }

  const messages = extractMessages(loaded.log, {
    includeToolDetail: options.includeToolDetail,
    config: options.extraction,
  });
  if (messages.length === 0) {
    diagnostics.push(
      diagnostic(
        "empty_log",
        `Execution log ${loaded.path} yielded no messages`,
        executionId,
      ),
    );
  }
  return messages;
}

/**
 * Rebuild a session's conversation from its most recent usable log,
 * falling back to the raw session text when no log yields anything.
 */
export async function reconstructCumulative(
  session: SessionRecord,
  index: ExecutionLogIndex,
  options: CumulativeOptions = {},
): Promise<CumulativeResult> {
  const diagnostics: Diagnostic[] = [];
  const refs = sessionExecutionRefs(session);

  if (refs.length === 0) {
    diagnostics.push(
      diagnostic(
        "raw_fallback",
        `Session ${session.sessionId} has no execution references; using session text as-is`,
      ),
    );
    return { messages: toReconciledMessages(session), diagnostics };
  }

  const latest = refs[refs.length - 1];
  for (let i = refs.length - 1; i >= 0; i--) {
    const executionId = refs[i];
    const messages = await messagesFromLog(index, executionId, options, diagnostics);
    if (messages.length === 0) continue;

    if (executionId !== latest) {
      diagnostics.push(
        diagnostic(
          "cumulative_fallback",
          `Latest execution log ${latest} yielded nothing; reconstructed from earlier log ${executionId}`,
          executionId,
        ),
      );
    }
    return { messages: toReconciled(messages), diagnostics, executionId };
  }

  diagnostics.push(
    diagnostic(
      "raw_fallback",
      `None of ${refs.length} execution log(s) (${refs.join(", ")}) yielded messages; using session text as-is`,
    ),
  );
  return { messages: toReconciledMessages(session), diagnostics };
}

export const DEDUPE_PREFIX_LENGTH = 200;

function prefixHash(content: string, prefixLength: number): string {
  return createHash("sha256")
    .update(content.trim().slice(0, prefixLength))
    .digest("hex");
}

/**
 * Drop user messages whose content prefix was already seen. For callers
 * that chain several cumulative logs; assistant messages always pass.
 */
export function dedupeUserMessages<T extends ReconciledMessage>(
  messages: T[],
  prefixLength: number = DEDUPE_PREFIX_LENGTH,
): T[] {
  const seen = new Set<string>();
  return messages.filter((m) => {
    if (m.role !== "user") return true;
    const hash = prefixHash(m.content, prefixLength);
    if (seen.has(hash)) return false;
    seen.add(hash);
    return true;
  });
}
