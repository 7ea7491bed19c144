import { rewriteMarkers } from "./marker";
import { logProxyError } from "../utils/logger";
import { isRecord } from "../utils/guards";

export interface RewriteSummary {
  replaced: number;
  failedEntries: number;
}

type EntryRecord = Record<string, unknown>;

type EntryShape =
  | { kind: "plain"; text: string }
  | { kind: "text-content"; entry: EntryRecord; text: string }
  | { kind: "parts-content"; parts: unknown[] }
  | { kind: "unrecognized" };

export function classifyEntry(entry: unknown): EntryShape {
  if (typeof entry === "string") {
    return { kind: "plain", text: entry };
  }

  if (isRecord(entry)) {
    const content = entry.content;
    if (typeof content === "string") {
      return { kind: "text-content", entry, text: content };
    }
    if (Array.isArray(content)) {
      return { kind: "parts-content", parts: content };
    }
  }

  return { kind: "unrecognized" };
}

function rewriteParts(parts: unknown[]): number {
  let replaced = 0;

  for (const part of parts) {
    if (!isRecord(part) || part.type !== "text" || typeof part.text !== "string") continue;

    const result = rewriteMarkers(part.text);
    if (result.count > 0) {
      part.text = result.text;
      replaced += result.count;
    }
  }

  return replaced;
}

function rewriteEntry(entries: unknown[], index: number): number {
  const shape = classifyEntry(entries[index]);

  switch (shape.kind) {
    case "plain": {
      const result = rewriteMarkers(shape.text);
      if (result.count > 0) {
        entries[index] = result.text;
      }
      return result.count;
    }
    case "text-content": {
      const result = rewriteMarkers(shape.text);
      if (result.count > 0) {
        shape.entry.content = result.text;
      }
      return result.count;
    }
    case "parts-content":
      return rewriteParts(shape.parts);
    case "unrecognized":
      return 0;
  }
}

/**
 * Rewrites every `<system_reminder>Current datetime: …</system_reminder>` marker
 * in the given history to `<date_and_time>…</date_and_time>`, in place.
 *
 * Every entry is visited, the most recent one included. An entry that fails to
 * process is logged and skipped; the call itself never throws.
 */
export function rewriteHistory(entries: unknown[]): RewriteSummary {
  const summary: RewriteSummary = { replaced: 0, failedEntries: 0 };

  for (let i = 0; i < entries.length; i++) {
    try {
      summary.replaced += rewriteEntry(entries, i);
    } catch (e) {
      summary.failedEntries++;
      logProxyError("HistoryRewriter", `Skipping entry ${i}`, e);
    }
  }

  return summary;
}
