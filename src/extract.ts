/**
 * Message extraction from decoded execution logs.
 *
 * A log may carry the conversation in up to three containers. We pick the
 * one with the most raw entries (ties go to the earlier of context, input,
 * top-level) and fold each entry's typed blocks into plain content.
 */

import type {
  ExecutionLogRecord,
  ExtractedMessage,
  ExtractedRole,
  MessageSource,
  RawLogEntry,
  ToolCall,
  TypedBlock,
} from "./types.ts";
import { resolveExtractionConfig, type ExtractionConfig } from "./config.ts";
import { isRecord, stringField } from "./utils/json.ts";
import { extractToolSummary } from "./utils/summary.ts";

export interface ExtractOptions {
  /** Keep tool-role messages and render tool markers into content */
  includeToolDetail?: boolean;
  config?: Partial<ExtractionConfig>;
}

const SOURCE_ORDER: readonly MessageSource[] = ["context", "input", "topLevel"];

/**
 * Pick the container with the greatest raw entry count.
 */
export function selectMessageSource(log: ExecutionLogRecord): {
  source: MessageSource;
  entries: unknown[];
} {
  let best: MessageSource = SOURCE_ORDER[0];
  for (const source of SOURCE_ORDER) {
    if (log.containers[source].length > log.containers[best].length) {
      best = source;
    }
  }
  return { source: best, entries: log.containers[best] };
}

/**
 * Decode one raw block into the tagged variant.
 */
export function parseBlock(raw: unknown): TypedBlock {
  if (!isRecord(raw)) return { kind: "unknown", type: typeof raw };

  const type = stringField(raw, "type") ?? "";
  switch (type) {
    case "text":
      return { kind: "text", text: stringField(raw, "text") ?? "" };
    case "toolUse":
    case "tool_use": {
      const args = raw.args;
      const alt = raw.input;
      const input = isRecord(args) ? args : isRecord(alt) ? alt : {};
      return {
        kind: "tool_invocation",
        name: stringField(raw, "name") ?? "unknown",
        input,
      };
    }
    case "toolUseResponse":
    case "tool_result":
      return {
        kind: "tool_response",
        name: stringField(raw, "name"),
        success: raw.success !== false && raw.is_error !== true,
      };
    case "document":
      return { kind: "document" };
    default:
      return { kind: "unknown", type };
  }
}

/**
 * Decode one raw container entry. Entries without a role are undefined.
 */
export function parseRawEntry(raw: unknown): RawLogEntry | undefined {
  if (!isRecord(raw)) return undefined;
  const role = stringField(raw, "role");
  if (!role) return undefined;
  const blocks = Array.isArray(raw.entries) ? raw.entries : [];
  return { role, entries: blocks.map(parseBlock) };
}

export function normalizeLogRole(role: string): ExtractedRole | undefined {
  switch (role) {
    case "human":
    case "user":
      return "user";
    case "bot":
    case "assistant":
      return "assistant";
    case "tool":
      return "tool";
    default:
      return undefined;
  }
}

function containsInternalMarker(text: string, markers: readonly string[]): boolean {
  return markers.some((m) => text.includes(m));
}

function toolResponseMarker(block: { name?: string; success: boolean }): string {
  const status = block.success ? "ok" : "failed";
  return block.name
    ? `[Tool result: ${block.name} ${status}]`
    : `[Tool result: ${status}]`;
}

/**
 * Fold one entry's blocks into content. Returns undefined when the whole
 * message must be dropped (internal marker found, or nothing to show).
 */
function foldEntry(
  entry: RawLogEntry,
  includeToolDetail: boolean,
  markers: readonly string[],
): { content: string; toolCalls: ToolCall[] } | undefined {
  const parts: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of entry.entries) {
    switch (block.kind) {
      case "text":
        if (containsInternalMarker(block.text, markers)) return undefined;
        if (block.text) parts.push(block.text);
        break;
      case "tool_invocation":
        toolCalls.push({
          name: block.name,
          summary: extractToolSummary(block.name, block.input),
          input: block.input,
        });
        if (includeToolDetail) parts.push(`[Tool: ${block.name}]`);
        break;
      case "tool_response":
        if (includeToolDetail) parts.push(toolResponseMarker(block));
        break;
      case "document":
      case "unknown":
        break;
      default: {
        const exhaustive: never = block;
        return exhaustive;
      }
    }
  }

  const content = parts.join("\n");
  if (!content.trim()) return undefined;
  return { content, toolCalls };
}

/**
 * Extract ordered {role, content} messages from a decoded log.
 */
export function extractMessages(
  log: ExecutionLogRecord,
  options: ExtractOptions = {},
): ExtractedMessage[] {
  const includeToolDetail = options.includeToolDetail ?? false;
  const { internalMarkers } = resolveExtractionConfig(options.config);
  const { entries } = selectMessageSource(log);
  const messages: ExtractedMessage[] = [];

  for (const raw of entries) {
    const entry = parseRawEntry(raw);
    if (!entry) continue;

    const role = normalizeLogRole(entry.role);
    if (!role) continue;
    if (role === "tool" && !includeToolDetail) continue;

    const folded = foldEntry(entry, includeToolDetail, internalMarkers);
    if (!folded) continue;

    messages.push({ role, ...folded });
  }

  return messages;
}

/**
 * Just the assistant responses, in order.
 */
export function extractAssistantResponses(
  log: ExecutionLogRecord,
  options: ExtractOptions = {},
): string[] {
  return extractMessages(log, options)
    .filter((m) => m.role === "assistant")
    .map((m) => m.content);
}
