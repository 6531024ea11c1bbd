/**
 * One-line summaries for tool invocations found in execution logs.
 */

import { truncate } from "./text.ts";

type ToolInput = Record<string, unknown>;

/** Scalar arguments only; nested objects and arrays summarize to "". */
function arg(i: ToolInput, key: string): string {
  const value = Object.hasOwn(i, key) ? i[key] : undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function pathOf(i: ToolInput): string {
  return arg(i, "path") || arg(i, "targetFile") || arg(i, "file_path");
}

function pathList(i: ToolInput): string {
  const paths = Object.hasOwn(i, "paths") ? i.paths : undefined;
  if (Array.isArray(paths)) {
    const names = paths.filter((p): p is string => typeof p === "string");
    return truncate(names.join(", "), 80);
  }
  return pathOf(i);
}

function command(i: ToolInput): string {
  return truncate(arg(i, "command"), 60);
}

// Tool names come straight from log files, so never look them up on a plain object
const extractors = new Map<string, (input: ToolInput) => string>([
  ["readFile", pathOf],
  ["readMultipleFiles", pathList],
  ["fsWrite", pathOf],
  ["fsAppend", pathOf],
  ["strReplace", pathOf],
  ["deleteFile", pathOf],
  ["listDirectory", pathOf],
  ["getDiagnostics", pathList],
  ["executeBash", command],
  ["executePwsh", command],
  [
    "grepSearch",
    (i) => {
      const include = arg(i, "includePattern");
      return truncate(arg(i, "query") + (include ? ` in ${include}` : ""), 80);
    },
  ],
  ["fileSearch", (i) => arg(i, "query")],
]);

export function extractToolSummary(toolName: string, input: ToolInput): string {
  const extractor = extractors.get(toolName);
  if (extractor) {
    const summary = extractor(input);
    if (summary) return summary;
  }
  // Unknown tools: fall back to a path-like argument if there is one
  return pathOf(input);
}
