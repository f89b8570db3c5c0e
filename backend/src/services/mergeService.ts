import type { Clock, ParsedHighlight, StoredHighlight } from "../types.js";
import { signatureKey } from "./highlightSignature.js";

export type MergeResult = {
  merged: StoredHighlight[];
  added: number;
};

/**
 * Appends every incoming highlight whose signature is not already present.
 * Existing records keep their order and are never replaced; the first
 * occurrence of a signature wins within the incoming batch as well.
 */
export function mergeHighlights(
  existing: StoredHighlight[],
  incoming: ParsedHighlight[],
  now: Clock = () => new Date()
): MergeResult {
  const seen = new Set(existing.map((highlight) => signatureKey(highlight)));
  const addedAt = now().toISOString();
  const merged = existing.slice();
  let added = 0;

  for (const highlight of incoming) {
    const key = signatureKey(highlight);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    merged.push({ ...highlight, added_at: addedAt });
    added += 1;
  }

  return { merged, added };
}
