/**
 * Sequential enrichment: replace agent placeholders in a session with the
 * full responses recovered from its execution log.
 *
 * Matching is positional. The Nth agent entry in the session pairs with
 * the Nth assistant response in the log, and each pair must pass
 * validateEnrichment before the replacement is committed.
 */

import type {
  Diagnostic,
  ExecutionLogIndex,
  ReconciledMessage,
  SessionEntry,
  SessionRecord,
} from "./types.ts";
import {
  resolveValidationConfig,
  type ExtractionConfig,
  type ValidationConfig,
} from "./config.ts";
import { loadIndexedLog } from "./log-loader.ts";
import { extractAssistantResponses } from "./extract.ts";
import { isAgentRole, sessionExecutionRef, toReconciledMessages } from "./session.ts";
import { diagnostic } from "./utils/diagnostics.ts";
import { truncate } from "./utils/text.ts";

export interface EnrichOptions {
  /** Abort (leave the session untouched) on any count mismatch */
  strict?: boolean;
  includeToolDetail?: boolean;
  validation?: Partial<ValidationConfig>;
  extraction?: Partial<ExtractionConfig>;
}

export interface EnrichResult {
  /** The rewritten session; safe to feed back in */
  session: SessionRecord;
  messages: ReconciledMessage[];
  diagnostics: Diagnostic[];
  enrichedCount: number;
}

/**
 * Decide whether `candidate` may replace `original`.
 */
export function validateEnrichment(
  original: string,
  candidate: string,
  config?: Partial<ValidationConfig>,
): boolean {
  const { acknowledgments, shortPlaceholderLength, wordWindow, minMatchingWords } =
    resolveValidationConfig(config);

  if (!original.trim()) return true;

  const originalLower = original.toLowerCase().trim();
  const candidateLower = candidate.toLowerCase();

  if (acknowledgments.some((ack) => originalLower.startsWith(ack))) {
    return true;
  }

  // Code points, so astral characters count once
  if ([...original].length < shortPlaceholderLength) return true;

  if (candidateLower.includes(originalLower)) return true;

  const originalWords = originalLower.split(/\s+/).slice(0, wordWindow);
  const candidateWords = candidateLower.trim().split(/\s+/).slice(0, wordWindow);
  let matching = 0;
  for (let i = 0; i < Math.min(originalWords.length, candidateWords.length); i++) {
    if (originalWords[i] && originalWords[i] === candidateWords[i]) matching++;
  }
  return matching >= minMatchingWords;
}

function unchanged(
  session: SessionRecord,
  diagnostics: Diagnostic[],
): EnrichResult {
  return {
    session,
    messages: toReconciledMessages(session),
    diagnostics,
    enrichedCount: 0,
  };
}

/**
 * Enrich a session against its execution log. Recoverable problems leave
 * the affected content as it was and show up as diagnostics.
 */
export async function enrichSequential(
  session: SessionRecord,
  index: ExecutionLogIndex,
  options: EnrichOptions = {},
): Promise<EnrichResult> {
  const diagnostics: Diagnostic[] = [];

  const executionId = sessionExecutionRef(session);
  if (!executionId) {
    diagnostics.push(
      diagnostic(
        "no_execution_ref",
        `Session ${session.sessionId} has no execution reference`,
      ),
    );
    return unchanged(session, diagnostics);
  }

  const loaded = await loadIndexedLog(index, executionId);
  if (!loaded.ok) {
    diagnostics.push(loaded.diagnostic);
    return unchanged(session, diagnostics);
  }

  const responses = extractAssistantResponses(loaded.log, {
    includeToolDetail: options.includeToolDetail,
    config: options.extraction,
  });
  if (responses.length === 0) {
    diagnostics.push(
      diagnostic(
        "empty_log",
        `No assistant responses found in execution log: ${loaded.path}`,
        executionId,
      ),
    );
    return unchanged(session, diagnostics);
  }

  const placeholderCount = session.entries.filter((e) =>
    isAgentRole(e.role),
  ).length;

  if (placeholderCount !== responses.length) {
    const mismatch =
      `Assistant message count mismatch: session has ${placeholderCount}, ` +
      `execution log has ${responses.length}.`;

    if (options.strict) {
      diagnostics.push(
        diagnostic(
          "count_mismatch",
          `${mismatch} Strict mode: skipping enrichment.`,
          executionId,
        ),
      );
      return unchanged(session, diagnostics);
    }

    const shortfall =
      responses.length < placeholderCount
        ? ` Only ${responses.length} of ${placeholderCount} messages can be enriched; the rest keep their original content.`
        : "";
    diagnostics.push(
      diagnostic(
        "count_mismatch",
        `${mismatch} Partial enrichment will be attempted.${shortfall}`,
        executionId,
      ),
    );
  }

  let responseIndex = 0;
  let enrichedCount = 0;
  const entries: SessionEntry[] = [];

  for (const entry of session.entries) {
    if (!isAgentRole(entry.role)) {
      entries.push(entry);
      continue;
    }

    if (responseIndex >= responses.length) {
      entries.push(entry);
      continue;
    }

    const candidate = responses[responseIndex];
    if (validateEnrichment(entry.text, candidate, options.validation)) {
      entries.push({ ...entry, text: candidate });
      enrichedCount++;
    } else {
      diagnostics.push(
        diagnostic(
          "validation_failed",
          `Enrichment validation failed for assistant message ${responseIndex + 1}: ` +
            `original '${truncate(entry.text, 50)}' doesn't match the full response. Keeping original content.`,
          executionId,
        ),
      );
      entries.push(entry);
    }
    responseIndex++;
  }

  const enriched: SessionRecord = { ...session, entries };
  return {
    session: enriched,
    messages: toReconciledMessages(enriched),
    diagnostics,
    enrichedCount,
  };
}
