/**
 * CLI entry point using cmd-ts.
 */

import {
  command,
  subcommands,
  run,
  string,
  option,
  optional,
  positional,
  flag,
  oneOf,
} from "cmd-ts";
import { readFile } from "fs/promises";
import { resolveDataRoot, DATA_ROOT_ENV } from "./config.ts";
import { buildExecutionLogIndex } from "./log-index.ts";
import {
  createReconciler,
  assertDataRoot,
  DataRootError,
  RECONCILE_MODES,
  type ReconcileOptions,
} from "./reconcile.ts";
import { discoverWorkspaces, loadWorkspace, parseSession } from "./workspace.ts";
import { reconcileWorkspaces } from "./batch.ts";
import type { Diagnostic } from "./types.ts";

// Shared options
const dataRootOpt = option({
  type: optional(string),
  long: "data-root",
  short: "d",
  description: `Execution log root (default: $${DATA_ROOT_ENV} or the IDE agent's storage directory)`,
});

const modeOpt = option({
  type: optional(oneOf([...RECONCILE_MODES])),
  long: "mode",
  short: "m",
  description: "enrich (replace placeholders) or reconstruct (latest cumulative log); default: enrich",
});

const strictFlag = flag({
  long: "strict",
  description: "Skip enrichment entirely when message counts disagree",
});

const toolDetailFlag = flag({
  long: "tool-detail",
  description: "Include tool invocations and results in message content",
});

const quietFlag = flag({
  long: "quiet",
  short: "q",
  description: "Suppress diagnostics and progress output",
});

function reportDiagnostics(label: string, diagnostics: Diagnostic[]): void {
  for (const d of diagnostics) {
    const prefix = d.severity === "warning" ? "Warning" : "Note";
    console.error(`${prefix} [${label}] ${d.kind}: ${d.message}`);
  }
}

async function withDataRoot<T>(
  dataRoot: string | undefined,
  fn: (root: string) => Promise<T>,
): Promise<T> {
  const root = resolveDataRoot(dataRoot);
  try {
    return await fn(root);
  } catch (err) {
    if (err instanceof DataRootError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

// Reconcile subcommand: one session file
const reconcileCmd = command({
  name: "reconcile",
  description: "Reconcile one session file against its execution logs (default)",
  args: {
    input: positional({
      type: string,
      displayName: "session-file",
      description: "Session file to reconcile",
    }),
    dataRoot: dataRootOpt,
    mode: modeOpt,
    strict: strictFlag,
    toolDetail: toolDetailFlag,
    quiet: quietFlag,
  },
  async handler({ input, dataRoot, mode, strict, toolDetail, quiet }) {
    const session = parseSession(await readFile(input, "utf-8"), input);
    const options: ReconcileOptions = {
      mode: mode ?? "enrich",
      strict,
      includeToolDetail: toolDetail,
    };

    await withDataRoot(dataRoot, async (root) => {
      const reconciler = await createReconciler(root);
      const result = await reconciler.reconcile(session, options);
      if (!quiet) reportDiagnostics(session.sessionId, result.diagnostics);
      console.log(JSON.stringify(result, null, 2));
    });
  },
});

// Batch subcommand: one workspace, or every workspace under the data root
const batchCmd = command({
  name: "batch",
  description: "Reconcile every session of a workspace (default: all workspaces)",
  args: {
    workspace: positional({
      type: optional(string),
      displayName: "workspace-dir",
      description: "Workspace session directory holding sessions.json (omit for all)",
    }),
    dataRoot: dataRootOpt,
    mode: modeOpt,
    strict: strictFlag,
    toolDetail: toolDetailFlag,
    quiet: quietFlag,
  },
  async handler({ workspace, dataRoot, mode, strict, toolDetail, quiet }) {
    const options: ReconcileOptions = {
      mode: mode ?? "enrich",
      strict,
      includeToolDetail: toolDetail,
    };

    await withDataRoot(dataRoot, async (root) => {
      const reconciler = await createReconciler(root);
      const workspaces = workspace
        ? [await loadWorkspace(workspace)]
        : await discoverWorkspaces(root);
      if (!quiet) {
        const sessionCount = workspaces.reduce((n, w) => n + w.sessions.length, 0);
        console.error(
          `Indexed ${reconciler.index.size} execution logs; reconciling ${sessionCount} sessions in ${workspaces.length} workspaces`,
        );
      }

      const outcomes = await reconcileWorkspaces(reconciler, workspaces, options);
      if (!quiet) {
        for (const outcome of outcomes) {
          reportDiagnostics(outcome.sessionId ?? outcome.path, outcome.diagnostics);
        }
      }
      console.log(JSON.stringify(outcomes, null, 2));
    });
  },
});

// Index subcommand: dump executionId → path
const indexCmd = command({
  name: "index",
  description: "List the execution logs found under a data root",
  args: {
    dataRoot: positional({
      type: optional(string),
      displayName: "data-root",
      description: "Execution log root (omit for the default)",
    }),
    quiet: quietFlag,
  },
  async handler({ dataRoot, quiet }) {
    await withDataRoot(dataRoot, async (root) => {
      await assertDataRoot(root);
      const index = await buildExecutionLogIndex(root);
      for (const [executionId, path] of index) {
        console.log(`${executionId}\t${path}`);
      }
      if (!quiet) console.error(`${index.size} execution logs under ${root}`);
    });
  },
});

const SUBCOMMANDS = ["reconcile", "batch", "index"] as const;

const cli = subcommands({
  name: "transcript-reconcile",
  description: "Recover full agent transcripts from abbreviated session histories",
  cmds: {
    reconcile: reconcileCmd,
    batch: batchCmd,
    index: indexCmd,
  },
});

const args = process.argv.slice(2);

// If first arg isn't a subcommand (and isn't a help flag), prepend "reconcile" as the default
const isSubcommand =
  args.length > 0 &&
  SUBCOMMANDS.some((name) => name === args[0]);
const isHelpFlag =
  args.length === 0 || args[0] === "--help" || args[0] === "-h";
const effectiveArgs = isSubcommand || isHelpFlag ? args : ["reconcile", ...args];

run(cli, effectiveArgs).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
