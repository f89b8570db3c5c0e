import type { HighlightStore, RandomSource, StoredHighlight } from "../types.js";

export const SAMPLE_CLIPPINGS = [
  "\uFEFFDeep Work (Cal Newport)",
  "- Your Highlight on page 42 | location 812-815 | Added on Tuesday, January 1, 2024 1:00:00 PM",
  "",
  "Focus is the new IQ.",
  "==========",
  "Deep Work (Cal Newport)",
  "- Your Bookmark on page 50 | location 901 | Added on Tuesday, January 1, 2024 1:05:00 PM",
  "",
  "",
  "==========",
  "Meditations (Marcus Aurelius)",
  "- Your Note on location 120 | Added on Wednesday, January 2, 2024 7:55:00 AM",
  "",
  "Remember this one.",
  "==========",
  "Meditations (Marcus Aurelius)",
  "- Your Highlight on Location 130 | Added on Wednesday, January 2, 2024 8:00:00 AM",
  "",
  "You have power over your mind,",
  "  not outside events.  ",
  "==========",
  ""
].join("\n");

// mulberry32
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeHighlight(overrides: Partial<StoredHighlight> = {}): StoredHighlight {
  return {
    title: "Deep Work",
    author: "Cal Newport",
    text: "Focus is the new IQ.",
    added_at: "2024-01-01T00:00:00.000Z",
    ...overrides
  };
}

export function createMemoryHighlightStore(initial: StoredHighlight[] = []): HighlightStore & {
  snapshot: () => StoredHighlight[];
  saveCount: () => number;
} {
  const clone = (records: StoredHighlight[]) => records.map((record) => ({ ...record }));
  let records = clone(initial);
  let saves = 0;
  return {
    describe: () => "memory",
    load: async () => clone(records),
    save: async (highlights) => {
      records = clone(highlights);
      saves += 1;
    },
    snapshot: () => clone(records),
    saveCount: () => saves
  };
}
