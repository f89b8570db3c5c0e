import { v4 as uuidv4 } from "uuid";
import { SourceUnreadableError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BookSummary, Clock, HighlightStore, SkipCounts } from "../types.js";
import {
  decodeClippings,
  parseClippings,
  readClippingsFile,
  summarizeBooks
} from "./clippingsParser.js";
import { mergeHighlights } from "./mergeService.js";

export type ImportReport = {
  importId: string;
  dryRun: boolean;
  parsed: number;
  skipped: SkipCounts;
  books: BookSummary[];
  totalBooks: number;
  added: number;
  total: number;
};

type ImportArgs = {
  bytes: Uint8Array;
  store: HighlightStore;
  logger: Logger;
  dryRun?: boolean;
  now?: Clock;
};

export async function importClippings(args: ImportArgs): Promise<ImportReport> {
  const importId = uuidv4();
  const log = args.logger.child({ importId });
  const content = decodeClippings(args.bytes);
  const { highlights, skipped } = parseClippings(content);
  const { books, totalBooks } = summarizeBooks(highlights);

  log.info({ parsed: highlights.length, skipped, totalBooks }, "Parsed clippings");

  if (highlights.length === 0) {
    throw new SourceUnreadableError("No highlights found. Check the clippings file format.");
  }

  const report = {
    importId,
    parsed: highlights.length,
    skipped,
    books,
    totalBooks
  };

  const existing = await args.store.load();
  const { merged, added } = mergeHighlights(existing, highlights, args.now);

  // A dry run reports what would be added without writing.
  if (args.dryRun) {
    return { ...report, dryRun: true, added, total: merged.length };
  }

  await args.store.save(merged);
  log.info({ added, total: merged.length, store: args.store.describe() }, "Import complete");

  return { ...report, dryRun: false, added, total: merged.length };
}

export async function importClippingsFile(
  args: Omit<ImportArgs, "bytes"> & { filePath: string }
): Promise<ImportReport> {
  const { filePath, ...rest } = args;
  args.logger.info({ filePath }, "Reading clippings file");
  const bytes = await readClippingsFile(filePath);
  return importClippings({ ...rest, bytes });
}
