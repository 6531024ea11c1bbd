export type {
  SessionEntry,
  SessionRecord,
  ExecutionLogRecord,
  ExecutionLogIndex,
  MessageSource,
  TypedBlock,
  RawLogEntry,
  ToolCall,
  ExtractedMessage,
  ReconciledMessage,
  MessageRole,
  Diagnostic,
  DiagnosticKind,
  ReconcileResult,
  DiscoveredSession,
  Workspace,
} from "./types.ts";

export {
  DEFAULT_INDEX_CONFIG,
  DEFAULT_VALIDATION_CONFIG,
  DEFAULT_EXTRACTION_CONFIG,
  resolveDataRoot,
  type IndexConfig,
  type ValidationConfig,
  type ExtractionConfig,
} from "./config.ts";
export { buildExecutionLogIndex, findExecutionLogDirs } from "./log-index.ts";
export { loadExecutionLog, loadIndexedLog, type LoadResult } from "./log-loader.ts";
export { extractMessages, extractAssistantResponses, selectMessageSource } from "./extract.ts";
export { enrichSequential, validateEnrichment, type EnrichResult } from "./enrich.ts";
export { reconstructCumulative, dedupeUserMessages, type CumulativeResult } from "./cumulative.ts";
export {
  reconcileSession,
  reconcileWithIndex,
  createReconciler,
  DataRootError,
  type Reconciler,
  type ReconcileMode,
  type ReconcileOptions,
} from "./reconcile.ts";
export { diagnosticMessages } from "./utils/diagnostics.ts";
export {
  parseSession,
  discoverSessions,
  discoverWorkspaces,
  loadWorkspace,
  decodeWorkspacePath,
  SessionParseError,
} from "./workspace.ts";
export {
  reconcileWorkspace,
  reconcileWorkspaces,
  type SessionOutcome,
} from "./batch.ts";
