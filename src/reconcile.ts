/**
 * Reconciliation entry point.
 *
 * Two strategies:
 * - "enrich": keep the session's shape, swap agent placeholders for the
 *   full responses of its execution log (see enrich.ts)
 * - "reconstruct": rebuild the conversation from the latest cumulative
 *   execution log (see cumulative.ts)
 */

import { stat } from "fs/promises";
import type {
  ExecutionLogIndex,
  ReconcileResult,
  SessionRecord,
} from "./types.ts";
import type {
  ExtractionConfig,
  IndexConfig,
  ValidationConfig,
} from "./config.ts";
import { buildExecutionLogIndex } from "./log-index.ts";
import { enrichSequential } from "./enrich.ts";
import { reconstructCumulative } from "./cumulative.ts";

export type ReconcileMode = "enrich" | "reconstruct";

export const RECONCILE_MODES: readonly ReconcileMode[] = ["enrich", "reconstruct"];

export interface ReconcileOptions {
  /** Default: "enrich" */
  mode?: ReconcileMode;
  /** Enrich mode only: skip enrichment entirely on a count mismatch */
  strict?: boolean;
  includeToolDetail?: boolean;
  validation?: Partial<ValidationConfig>;
  extraction?: Partial<ExtractionConfig>;
}

/**
 * The data root is missing or not a directory. The only error the
 * engine raises; everything else becomes a diagnostic.
 */
export class DataRootError extends Error {
  readonly dataRoot: string;

  constructor(dataRoot: string, detail: string) {
    super(`Invalid data root ${dataRoot}: ${detail}`);
    this.name = "DataRootError";
    this.dataRoot = dataRoot;
  }
}

export async function assertDataRoot(dataRoot: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dataRoot)).isDirectory();
  } catch (err: unknown) {
    const code =
      err && typeof err === "object" && "code" in err ? String(err.code) : "";
    throw new DataRootError(
      dataRoot,
      code === "ENOENT"
        ? "does not exist"
        : `cannot be read (${err instanceof Error ? err.message : String(err)})`,
    );
  }
  if (!isDirectory) {
    throw new DataRootError(dataRoot, "not a directory");
  }
}

/**
 * Reconcile one session against a prebuilt index.
 */
export async function reconcileWithIndex(
  session: SessionRecord,
  index: ExecutionLogIndex,
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  if ((options.mode ?? "enrich") === "reconstruct") {
    const { messages, diagnostics } = await reconstructCumulative(
      session,
      index,
      {
        includeToolDetail: options.includeToolDetail,
        extraction: options.extraction,
      },
    );
    return { messages, diagnostics };
  }

  const { messages, diagnostics } = await enrichSequential(session, index, {
    strict: options.strict,
    includeToolDetail: options.includeToolDetail,
    validation: options.validation,
    extraction: options.extraction,
  });
  return { messages, diagnostics };
}

export interface Reconciler {
  readonly dataRoot: string;
  readonly index: ExecutionLogIndex;
  reconcile(
    session: SessionRecord,
    options?: ReconcileOptions,
  ): Promise<ReconcileResult>;
}

/**
 * Validate the data root and build its index once; the returned
 * reconciler reuses that index for every session.
 */
export async function createReconciler(
  dataRoot: string,
  indexConfig?: Partial<IndexConfig>,
): Promise<Reconciler> {
  await assertDataRoot(dataRoot);
  const index = await buildExecutionLogIndex(dataRoot, indexConfig);

  return {
    dataRoot,
    index,
    reconcile: (session, options) => reconcileWithIndex(session, index, options),
  };
}

/**
 * One-off reconciliation. Builds the index for this call only; prefer
 * createReconciler when handling more than one session.
 */
export async function reconcileSession(
  session: SessionRecord,
  dataRoot: string,
  options: ReconcileOptions & { index?: Partial<IndexConfig> } = {},
): Promise<ReconcileResult> {
  const reconciler = await createReconciler(dataRoot, options.index);
  return reconciler.reconcile(session, options);
}
