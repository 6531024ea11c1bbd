/**
 * IDE workspace sessions.
 *
 * Session files live under
 *   {dataRoot}/workspace-sessions/{base64url(project path)}/{sessionId}.json
 * next to a sessions.json listing. They hold only abbreviated agent
 * replies; the full text lives in the execution logs.
 */

import { basename, extname, join } from "path";
import { access, readdir, readFile } from "fs/promises";
import type {
  DiscoveredSession,
  SessionEntry,
  SessionRecord,
  Workspace,
} from "./types.ts";
import { isRecord, stringField, type JsonObject } from "./utils/json.ts";

export const WORKSPACE_SESSIONS_DIR = "workspace-sessions";
export const TITLE_MAX_LENGTH = 50;

export class SessionParseError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, detail: string) {
    super(`Cannot parse session ${sourcePath}: ${detail}`);
    this.name = "SessionParseError";
    this.sourcePath = sourcePath;
  }
}

/**
 * Workspace directory names are URL-safe base64 without padding.
 */
export function decodeWorkspacePath(encoded: string): string {
  if (!/^[A-Za-z0-9_-]*$/.test(encoded)) {
    throw new Error(`Failed to decode workspace path '${encoded}'`);
  }
  return Buffer.from(encoded, "base64url").toString("utf-8");
}

/**
 * Flatten message content (string or block list) to text.
 */
export function normalizeContent(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) {
    return content === null || content === undefined ? "" : String(content);
  }

  const parts: string[] = [];
  for (const block of content) {
    if (!isRecord(block)) continue;
    switch (block.type) {
      case "text": {
        const text = stringField(block, "text");
        if (text) parts.push(text);
        break;
      }
      case "tool_use":
        parts.push(`[Tool: ${stringField(block, "name") ?? "unknown"}]`);
        break;
      case "image":
      case "image_url":
        parts.push("[Image]");
        break;
    }
  }
  return parts.join("\n");
}

/**
 * History entries come either wrapped ({ message, executionId }) or bare
 * ({ role, content }).
 */
function toSessionEntry(raw: unknown): SessionEntry | undefined {
  if (!isRecord(raw)) return undefined;

  const wrapped = raw.message;
  const message: JsonObject | undefined = isRecord(wrapped)
    ? wrapped
    : "role" in raw
      ? raw
      : undefined;
  if (!message) return undefined;

  const entry: SessionEntry = {
    role: stringField(message, "role") ?? "unknown",
    text: normalizeContent(message.content),
  };
  const executionRef =
    stringField(raw, "executionId") ?? stringField(message, "executionId");
  if (executionRef) entry.executionRef = executionRef;
  return entry;
}

function sessionIdFromPath(sourcePath: string): string {
  return basename(sourcePath, extname(sourcePath));
}

function deriveTitle(entries: SessionEntry[]): string | undefined {
  const first = entries.find((e) => e.role === "user" || e.role === "human");
  const text = first?.text.trim();
  return text ? [...text].slice(0, TITLE_MAX_LENGTH).join("") : undefined;
}

export function parseSession(content: string, sourcePath: string): SessionRecord {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    throw new SessionParseError(
      sourcePath,
      e instanceof Error ? e.message : "invalid JSON",
    );
  }
  if (!isRecord(data)) {
    throw new SessionParseError(sourcePath, "not a JSON object");
  }

  const history = Array.isArray(data.history)
    ? data.history
    : Array.isArray(data.chat)
      ? data.chat
      : [];

  const entries = history.flatMap((raw) => {
    const entry = toSessionEntry(raw);
    return entry ? [entry] : [];
  });

  return {
    sessionId: sessionIdFromPath(sourcePath),
    title: stringField(data, "title") || deriveTitle(entries),
    executionId: stringField(data, "executionId"),
    entries,
  };
}

interface SessionListing {
  sessionId: string;
  title?: string;
}

function readListing(raw: unknown): SessionListing | undefined {
  if (!isRecord(raw)) return undefined;
  const sessionId = stringField(raw, "sessionId");
  if (!sessionId) return undefined;
  return { sessionId, title: stringField(raw, "title") };
}

/**
 * Discover sessions of one workspace directory from its sessions.json.
 * Listed sessions whose file is gone are skipped.
 */
export async function discoverSessions(
  workspaceDir: string,
): Promise<DiscoveredSession[]> {
  let listing: unknown;
  try {
    listing = JSON.parse(
      await readFile(join(workspaceDir, "sessions.json"), "utf-8"),
    );
  } catch {
    return [];
  }
  if (!Array.isArray(listing)) return [];

  const sessions: DiscoveredSession[] = [];
  for (const raw of listing) {
    const item = readListing(raw);
    if (!item) continue;

    const path = join(workspaceDir, `${item.sessionId}.json`);
    try {
      await access(path);
    } catch {
      continue; // listed but missing on disk
    }
    const session: DiscoveredSession = { path };
    if (item.title) session.title = item.title;
    sessions.push(session);
  }
  return sessions;
}

/**
 * Describe one workspace directory. The project path falls back to the
 * directory name when it isn't valid base64url.
 */
export async function loadWorkspace(dir: string): Promise<Workspace> {
  const name = basename(dir);
  let projectPath: string;
  try {
    projectPath = decodeWorkspacePath(name);
  } catch {
    projectPath = name;
  }
  return { dir, projectPath, sessions: await discoverSessions(dir) };
}

/**
 * All workspaces under a data root that list at least one session,
 * in directory-name order. A missing workspace-sessions directory
 * yields none.
 */
export async function discoverWorkspaces(dataRoot: string): Promise<Workspace[]> {
  const root = join(dataRoot, WORKSPACE_SESSIONS_DIR);
  let names: string[];
  try {
    names = (await readdir(root, { withFileTypes: true }))
      .filter((d) => d.isDirectory())
      .map((d) => d.name)
      .sort((a, b) => a.localeCompare(b));
  } catch {
    return [];
  }

  const workspaces: Workspace[] = [];
  for (const name of names) {
    const workspace = await loadWorkspace(join(root, name));
    if (workspace.sessions.length > 0) workspaces.push(workspace);
  }
  return workspaces;
}
