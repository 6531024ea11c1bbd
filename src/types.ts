/**
 * Shared types for transcript-reconcile.
 *
 * A session index (abbreviated, chronological) is reconciled against the
 * execution logs that hold the full message content. Everything here is
 * source-agnostic; adapters produce SessionRecords, the engine produces
 * ReconciledMessages plus Diagnostics.
 */

// ============================================================================
// Session side (input)
// ============================================================================

export interface SessionEntry {
  /** Role as written by the source ("user", "human", "bot", "assistant", ...) */
  role: string;
  /** Placeholder or full text */
  text: string;
  /** Execution log that supposedly produced this (agent) entry */
  executionRef?: string;
}

export interface SessionRecord {
  sessionId: string;
  title?: string;
  /** Session-level execution reference, when the source stores one */
  executionId?: string;
  entries: SessionEntry[];
}

// ============================================================================
// Execution log side
// ============================================================================

/** The three places a log may carry conversation data. */
export type MessageSource = "context" | "input" | "topLevel";

export interface ExecutionLogRecord {
  executionId?: string;
  /** Raw, undecoded entries per container (missing containers are empty) */
  containers: Record<MessageSource, unknown[]>;
}

export interface TextBlock {
  kind: "text";
  text: string;
}

export interface ToolInvocationBlock {
  kind: "tool_invocation";
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResponseBlock {
  kind: "tool_response";
  name?: string;
  success: boolean;
}

export interface DocumentBlock {
  kind: "document";
}

export interface UnknownBlock {
  kind: "unknown";
  type: string;
}

export type TypedBlock =
  | TextBlock
  | ToolInvocationBlock
  | ToolResponseBlock
  | DocumentBlock
  | UnknownBlock;

export interface RawLogEntry {
  role: string;
  entries: TypedBlock[];
}

export interface ToolCall {
  name: string;
  summary: string;
  input: Record<string, unknown>;
}

export type ExtractedRole = "user" | "assistant" | "tool";

export interface ExtractedMessage {
  role: ExtractedRole;
  content: string;
  toolCalls: ToolCall[];
}

// ============================================================================
// Output
// ============================================================================

export type MessageRole = "user" | "assistant";

export interface ReconciledMessage {
  role: MessageRole;
  content: string;
}

export type DiagnosticKind =
  | "no_execution_ref"
  | "log_not_found"
  | "log_unreadable"
  | "identity_mismatch"
  | "empty_log"
  | "count_mismatch"
  | "validation_failed"
  | "cumulative_fallback"
  | "raw_fallback"
  | "session_unreadable";

export interface Diagnostic {
  kind: DiagnosticKind;
  /** "info" is safe to ignore, "warning" deserves a manual look */
  severity: "info" | "warning";
  message: string;
  executionId?: string;
}

/** Read-only mapping from execution id to log file path. */
export type ExecutionLogIndex = ReadonlyMap<string, string>;

export interface ReconcileResult {
  messages: ReconciledMessage[];
  diagnostics: Diagnostic[];
}

// ============================================================================
// Workspace discovery
// ============================================================================

/**
 * A session file listed in a workspace's sessions.json.
 */
export interface DiscoveredSession {
  /** Absolute path to the session file. */
  path: string;
  /** Title from the listing, if it has one */
  title?: string;
}

/**
 * One IDE workspace: a directory of session files named after the
 * encoded project path.
 */
export interface Workspace {
  dir: string;
  /** Decoded project path, or the raw directory name when it doesn't decode */
  projectPath: string;
  sessions: DiscoveredSession[];
}
