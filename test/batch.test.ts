import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { join } from "path";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { reconcileWorkspace, reconcileWorkspaces } from "../src/batch.ts";
import { createReconciler } from "../src/reconcile.ts";
import { discoverWorkspaces, loadWorkspace } from "../src/workspace.ts";
import { diagnosticMessages } from "../src/utils/diagnostics.ts";
import { entry, logDocument, writeLog } from "./helpers.ts";

const PROJECT = "/home/dev/app";

let root: string;
let workspace: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "batch-test-"));
  workspace = join(
    root,
    "workspace-sessions",
    Buffer.from(PROJECT).toString("base64url"),
  );
  await mkdir(workspace, { recursive: true });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

async function writeSessions(
  listing: Array<{ sessionId: string; title?: string }>,
  files: Record<string, string>,
): Promise<void> {
  await writeFile(join(workspace, "sessions.json"), JSON.stringify(listing));
  for (const [id, content] of Object.entries(files)) {
    await writeFile(join(workspace, `${id}.json`), content);
  }
}

function sessionFile(executionId: string, user: string): string {
  return JSON.stringify({
    executionId,
    history: [
      { message: { role: "user", content: user } },
      { message: { role: "bot", content: "On it." } },
    ],
  });
}

describe("reconcileWorkspace", () => {
  it("reconciles every listed session against one index", async () => {
    await writeSessions(
      [
        { sessionId: "s1", title: "Rename" },
        { sessionId: "s2" },
      ],
      {
        s1: sessionFile("exec-1", "Rename the module"),
        s2: sessionFile("exec-missing", "Hello"),
      },
    );
    await writeLog(
      root,
      "log-1",
      logDocument("exec-1", [
        entry("human", "Rename the module"),
        entry("bot", "Renamed `util` to `helpers` and updated 4 imports."),
      ]),
    );

    const reconciler = await createReconciler(root);
    const outcomes = await reconcileWorkspace(reconciler, await loadWorkspace(workspace));

    expect(reconciler.index.size).toBe(1);
    expect(outcomes.map((o) => [o.sessionId, o.title, o.projectPath])).toEqual([
      ["s1", "Rename", PROJECT],
      ["s2", "Hello", PROJECT],
    ]);
    expect(outcomes[0].messages).toEqual([
      { role: "user", content: "Rename the module" },
      {
        role: "assistant",
        content: "Renamed `util` to `helpers` and updated 4 imports.",
      },
    ]);
    expect(outcomes[0].diagnostics).toEqual([]);
    expect(outcomes[1].messages.map((m) => m.content)).toEqual(["Hello", "On it."]);
    expect(diagnosticMessages(outcomes[1].diagnostics)).toEqual([
      "Execution log not found for executionId: exec-missing",
    ]);
  });

  it("reports a broken session file and carries on", async () => {
    await writeSessions(
      [
        { sessionId: "s1", title: "Broken" },
        { sessionId: "s2" },
      ],
      {
        s1: "{ truncated",
        s2: sessionFile("exec-2", "Still here"),
      },
    );

    const reconciler = await createReconciler(root);
    const outcomes = await reconcileWorkspace(reconciler, await loadWorkspace(workspace));

    expect(outcomes).toHaveLength(2);
    expect(outcomes[0].sessionId).toBeUndefined();
    expect(outcomes[0].path).toBe(join(workspace, "s1.json"));
    expect(outcomes[0].title).toBe("Broken");
    expect(outcomes[0].messages).toEqual([]);
    expect(outcomes[0].diagnostics).toHaveLength(1);
    expect(outcomes[0].diagnostics[0].kind).toBe("session_unreadable");
    expect(outcomes[0].diagnostics[0].severity).toBe("warning");
    expect(outcomes[0].diagnostics[0].message).toContain(
      `Cannot parse session ${join(workspace, "s1.json")}: `,
    );

    expect(outcomes[1].sessionId).toBe("s2");
    expect(outcomes[1].messages.map((m) => m.content)).toEqual([
      "Still here",
      "On it.",
    ]);
  });

  it("reports a session file that can't be read", async () => {
    await writeSessions([{ sessionId: "s1" }], { s1: sessionFile("exec-1", "q") });
    const listed = await loadWorkspace(workspace);
    await rm(join(workspace, "s1.json"));

    const reconciler = await createReconciler(root);
    const outcomes = await reconcileWorkspace(reconciler, listed);

    expect(outcomes.map((o) => o.diagnostics.map((d) => d.kind))).toEqual([
      ["session_unreadable"],
    ]);
  });
});

describe("reconcileWorkspaces", () => {
  it("walks every workspace under the data root", async () => {
    await writeSessions([{ sessionId: "s1" }], { s1: sessionFile("exec-1", "one") });
    const other = join(
      root,
      "workspace-sessions",
      Buffer.from("/home/dev/web").toString("base64url"),
    );
    await mkdir(other, { recursive: true });
    await writeFile(join(other, "sessions.json"), JSON.stringify([{ sessionId: "o1" }]));
    await writeFile(join(other, "o1.json"), sessionFile("exec-2", "two"));

    const reconciler = await createReconciler(root);
    const outcomes = await reconcileWorkspaces(
      reconciler,
      await discoverWorkspaces(root),
    );

    expect(outcomes.map((o) => [o.projectPath, o.sessionId])).toEqual([
      [PROJECT, "s1"],
      ["/home/dev/web", "o1"],
    ]);
  });
});
