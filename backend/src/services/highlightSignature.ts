import type { ParsedHighlight } from "../types.js";

export const SIGNATURE_PREFIX_LENGTH = 100;

export type DedupSignature = {
  title: string;
  textPrefix: string;
};

export function signatureOf(highlight: Pick<ParsedHighlight, "title" | "text">): DedupSignature {
  // Array.from walks code points, so astral characters are never split.
  const textPrefix = Array.from(highlight.text).slice(0, SIGNATURE_PREFIX_LENGTH).join("");
  return { title: highlight.title, textPrefix };
}

export function signatureKey(highlight: Pick<ParsedHighlight, "title" | "text">): string {
  const { title, textPrefix } = signatureOf(highlight);
  return JSON.stringify([title, textPrefix]);
}
