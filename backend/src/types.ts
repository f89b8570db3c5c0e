export type ParsedHighlight = {
  title: string;
  author: string;
  text: string;
  location?: string;
  page?: string;
};

// Keys other tools attach to a record are carried through untouched.
export type StoredHighlight = ParsedHighlight & {
  added_at: string;
  theme?: string;
  [extra: string]: unknown;
};

export type SkipReason = "empty" | "bookmark" | "note";

export type ParseResult =
  | { ok: true; highlight: ParsedHighlight }
  | { ok: false; reason: SkipReason };

export type SkipCounts = Record<SkipReason, number>;

export type ParsedClippings = {
  highlights: ParsedHighlight[];
  skipped: SkipCounts;
};

export type BookSummary = {
  title: string;
  author: string;
  count: number;
};

export type RandomSource = () => number;

export type Clock = () => Date;

export type HighlightStore = {
  load: () => Promise<StoredHighlight[]>;
  save: (highlights: StoredHighlight[]) => Promise<void>;
  describe: () => string;
};

export type ThemeClassifier = {
  classify: (title: string, author: string) => Promise<string>;
};

export type DigestDocument = {
  subject: string;
  html: string;
  text: string;
};

export type OutgoingDigest = DigestDocument & {
  to: string;
  from: string;
};

export type DigestDelivery = {
  send: (message: OutgoingDigest) => Promise<{ id: string }>;
};
