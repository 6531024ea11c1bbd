/**
 * Builders for on-disk execution log trees used across tests.
 */

import { join } from "path";
import { mkdir, writeFile } from "fs/promises";
import type { MessageSource, SessionRecord } from "../src/types.ts";

export const BUCKET = "0123456789abcdef0123456789abcdef";
export const SUB = "414d1636299d2b9e4ce7e17fb11f63e9";

export interface RawBlock {
  type: string;
  [key: string]: unknown;
}

export interface RawEntry {
  role: string;
  entries: RawBlock[];
}

export function text(value: string): RawBlock {
  return { type: "text", text: value };
}

export function entry(role: string, ...blocks: Array<RawBlock | string>): RawEntry {
  return {
    role,
    entries: blocks.map((b) => (typeof b === "string" ? text(b) : b)),
  };
}

/** A log document with `messages` placed in one container. */
export function logDocument(
  executionId: string,
  messages: RawEntry[],
  source: MessageSource = "topLevel",
): Record<string, unknown> {
  switch (source) {
    case "context":
      return { executionId, context: { messages } };
    case "input":
      return { executionId, input: { data: { messages } } };
    case "topLevel":
      return { executionId, messagesFromExecutionId: messages };
  }
}

/**
 * Write a log file at {root}/{bucket}/{sub}/{name}. Strings are written
 * verbatim, anything else as JSON.
 */
export async function writeLog(
  root: string,
  name: string,
  data: unknown,
  location: { bucket?: string; sub?: string } = {},
): Promise<string> {
  const dir = join(root, location.bucket ?? BUCKET, location.sub ?? SUB);
  await mkdir(dir, { recursive: true });
  const path = join(dir, name);
  await writeFile(path, typeof data === "string" ? data : JSON.stringify(data));
  return path;
}

export function session(
  entries: SessionRecord["entries"],
  executionId?: string,
): SessionRecord {
  return { sessionId: "session-1", executionId, entries };
}
