/**
 * Execution log index: executionId → log file path.
 *
 * Layout under the data root:
 *   {root}/{bucket: 32 hex chars}/{subdirectory}/{log file, no extension}
 *
 * Indexing is best-effort. Unreadable directories, unparseable files and
 * files without an executionId are skipped; the builder never throws.
 */

import { join, extname } from "path";
import { readdir, readFile } from "fs/promises";
import type { Dirent } from "fs";
import type { ExecutionLogIndex } from "./types.ts";
import { resolveIndexConfig, type IndexConfig } from "./config.ts";
import { isRecord, stringField } from "./utils/json.ts";

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  } catch {
    return [];
  }
}

function isLogFile(entry: Dirent): boolean {
  return entry.isFile() && extname(entry.name) === "";
}

/**
 * Find log directories: subdirectories of qualifying buckets that hold at
 * least one extensionless file. Returns each directory with its log files.
 */
export async function findExecutionLogDirs(
  dataRoot: string,
  config?: Partial<IndexConfig>,
): Promise<Array<{ dir: string; files: string[] }>> {
  const { skipDirectories, bucketPattern } = resolveIndexConfig(config);
  const result: Array<{ dir: string; files: string[] }> = [];

  for (const bucket of await listDir(dataRoot)) {
    if (!bucket.isDirectory()) continue;
    if (skipDirectories.includes(bucket.name)) continue;
    if (!bucketPattern.test(bucket.name)) continue;

    const bucketPath = join(dataRoot, bucket.name);
    for (const sub of await listDir(bucketPath)) {
      if (!sub.isDirectory()) continue;

      const subPath = join(bucketPath, sub.name);
      const files = (await listDir(subPath))
        .filter(isLogFile)
        .map((f) => join(subPath, f.name));

      if (files.length > 0) {
        result.push({ dir: subPath, files });
      }
    }
  }

  return result;
}

async function readExecutionId(path: string): Promise<string | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(path, "utf-8"));
    return isRecord(parsed) ? stringField(parsed, "executionId") : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Build the executionId → path index for a data root.
 * Build once per batch and share; the returned map is read-only.
 */
export async function buildExecutionLogIndex(
  dataRoot: string,
  config?: Partial<IndexConfig>,
): Promise<ExecutionLogIndex> {
  const index = new Map<string, string>();

  for (const { files } of await findExecutionLogDirs(dataRoot, config)) {
    for (const file of files) {
      const executionId = await readExecutionId(file);
      if (executionId) {
        index.set(executionId, file);
      }
    }
  }

  return index;
}
