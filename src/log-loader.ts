/**
 * Load and decode a single execution log file.
 */

import { readFile } from "fs/promises";
import type {
  Diagnostic,
  ExecutionLogIndex,
  ExecutionLogRecord,
  MessageSource,
} from "./types.ts";
import { diagnostic } from "./utils/diagnostics.ts";
import { arrayAt, isRecord, stringField, type JsonObject } from "./utils/json.ts";

export type LoadResult =
  | { ok: true; log: ExecutionLogRecord }
  | { ok: false; reason: string };

/** Key paths of the three message containers a log may carry. */
export const CONTAINER_PATHS: Readonly<
  Record<MessageSource, readonly string[]>
> = {
  context: ["context", "messages"],
  input: ["input", "data", "messages"],
  topLevel: ["messagesFromExecutionId"],
};

/**
 * View a decoded JSON object as an execution log. Missing or malformed
 * containers come back empty.
 */
export function toExecutionLogRecord(data: JsonObject): ExecutionLogRecord {
  return {
    executionId: stringField(data, "executionId"),
    containers: {
      context: arrayAt(data, CONTAINER_PATHS.context),
      input: arrayAt(data, CONTAINER_PATHS.input),
      topLevel: arrayAt(data, CONTAINER_PATHS.topLevel),
    },
  };
}

/**
 * Read and decode an execution log. Never throws: read and decode
 * failures come back as { ok: false } with the reason.
 */
export async function loadExecutionLog(path: string): Promise<LoadResult> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (e) {
    return {
      ok: false,
      reason: `Failed to read ${path}: ${e instanceof Error ? e.message : String(e)}`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    return {
      ok: false,
      reason: `Invalid JSON in ${path}: ${e instanceof Error ? e.message : "parse error"}`,
    };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: `Not a JSON object: ${path}` };
  }

  return { ok: true, log: toExecutionLogRecord(parsed) };
}

export type IndexedLoadResult =
  | { ok: true; log: ExecutionLogRecord; path: string }
  | { ok: false; diagnostic: Diagnostic };

/**
 * Resolve an execution id through the index, load the log and check that
 * the log's own id agrees with the one requested.
 */
export async function loadIndexedLog(
  index: ExecutionLogIndex,
  executionId: string,
): Promise<IndexedLoadResult> {
  const path = index.get(executionId);
  if (!path) {
    return {
      ok: false,
      diagnostic: diagnostic(
        "log_not_found",
        `Execution log not found for executionId: ${executionId}`,
        executionId,
      ),
    };
  }

  const loaded = await loadExecutionLog(path);
  if (!loaded.ok) {
    return {
      ok: false,
      diagnostic: diagnostic("log_unreadable", loaded.reason, executionId),
    };
  }

  const logId = loaded.log.executionId;
  if (logId && logId !== executionId) {
    return {
      ok: false,
      diagnostic: diagnostic(
        "identity_mismatch",
        `ExecutionId mismatch: session has '${executionId}', log has '${logId}'. Skipping this log.`,
        executionId,
      ),
    };
  }

  return { ok: true, log: loaded.log, path };
}
