import { promises as fs } from "node:fs";
import { SourceUnreadableError } from "../errors.js";
import type {
  BookSummary,
  ParsedClippings,
  ParseResult,
  SkipCounts
} from "../types.js";

export const ENTRY_SEPARATOR = "==========";
export const UNKNOWN_AUTHOR = "Unknown Author";

const BOOKMARK_MARKER = "Your Bookmark";
const NOTE_MARKER = "Your Note";

// Only the parenthesized group that closes the line is the author.
const AUTHOR_SUFFIX_REGEX = /\(([^)]+)\)\s*$/;
const LOCATION_REGEX = /location\s+(\d+)(?:-(\d+))?/i;
const PAGE_REGEX = /page\s+(\d+)/i;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });
const latin1Decoder = new TextDecoder("latin1");

/**
 * Decodes an export as UTF-8 (dropping a byte-order mark) and falls back to
 * Latin-1 when the bytes are not valid UTF-8. Latin-1 maps every byte, so the
 * second stage cannot fail.
 */
export function decodeClippings(bytes: Uint8Array): string {
  if (bytes.byteLength === 0) {
    throw new SourceUnreadableError("Clippings file is empty.");
  }
  if (isValidUtf8(bytes)) {
    return utf8Decoder.decode(bytes);
  }
  return latin1Decoder.decode(bytes);
}

function isValidUtf8(bytes: Uint8Array): boolean {
  try {
    utf8Decoder.decode(bytes);
    return true;
  } catch {
    return false;
  }
}

const READ_FAILURES: Record<string, string> = {
  ENOENT: "Clippings file not found",
  EACCES: "Permission denied reading clippings file",
  EPERM: "Permission denied reading clippings file",
  EISDIR: "Clippings path is a directory"
};

export async function readClippingsFile(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    const code = (error as { code?: string }).code;
    const reason = (code && READ_FAILURES[code]) || "Failed to read clippings file";
    throw new SourceUnreadableError(`${reason}: ${filePath}`, { cause: error });
  }
}

export function splitEntries(content: string): string[] {
  return content
    .split(ENTRY_SEPARATOR)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function splitTitleLine(line: string): { title: string; author: string } {
  const titleLine = line.trim().replace(/^\uFEFF+/, "").trim();
  const match = AUTHOR_SUFFIX_REGEX.exec(titleLine);
  if (!match) {
    return { title: titleLine, author: UNKNOWN_AUTHOR };
  }
  return {
    title: titleLine.slice(0, match.index).trim(),
    author: match[1].trim()
  };
}

function readLocation(metadata: string): string | undefined {
  const match = LOCATION_REGEX.exec(metadata);
  if (!match) {
    return undefined;
  }
  const start = match[1];
  const end = match[2] ?? start;
  return `${start}-${end}`;
}

function readPage(metadata: string): string | undefined {
  return PAGE_REGEX.exec(metadata)?.[1];
}

function readBody(lines: string[]): string {
  const body = lines
    .slice(3)
    .map((line) => line.trim())
    .filter(Boolean)
    .join("\n");
  if (body) {
    return body;
  }
  // Older exports put the text directly under the metadata line.
  return (lines[2] ?? "").trim();
}

export function parseEntry(block: string): ParseResult {
  const lines = block.split(/\r?\n/);
  if (lines.length < 2) {
    return { ok: false, reason: "empty" };
  }

  // A trimmed bookmark block is only two lines long, so the annotation type
  // is checked before the minimum length.
  const metadata = lines[1].trim();
  if (metadata.includes(BOOKMARK_MARKER)) {
    return { ok: false, reason: "bookmark" };
  }
  if (metadata.includes(NOTE_MARKER)) {
    return { ok: false, reason: "note" };
  }
  if (lines.length < 3) {
    return { ok: false, reason: "empty" };
  }

  const { title, author } = splitTitleLine(lines[0]);

  const text = readBody(lines);
  if (!text) {
    return { ok: false, reason: "empty" };
  }

  const location = readLocation(metadata);
  const page = readPage(metadata);

  return {
    ok: true,
    highlight: {
      title,
      author,
      text,
      ...(location ? { location } : {}),
      ...(page ? { page } : {})
    }
  };
}

export function emptySkipCounts(): SkipCounts {
  return { empty: 0, bookmark: 0, note: 0 };
}

export function parseClippings(content: string): ParsedClippings {
  const blocks = splitEntries(content);
  const skipped = emptySkipCounts();
  skipped.empty = content.split(ENTRY_SEPARATOR).length - blocks.length;

  const highlights: ParsedClippings["highlights"] = [];
  for (const block of blocks) {
    const result = parseEntry(block);
    if (result.ok) {
      highlights.push(result.highlight);
    } else {
      skipped[result.reason] += 1;
    }
  }

  return { highlights, skipped };
}

export function summarizeBooks(
  highlights: Array<{ title: string; author: string }>,
  limit = 10
): { books: BookSummary[]; totalBooks: number } {
  const counts = new Map<string, BookSummary>();
  for (const highlight of highlights) {
    const key = `${highlight.title} by ${highlight.author}`;
    const existing = counts.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      counts.set(key, { title: highlight.title, author: highlight.author, count: 1 });
    }
  }

  // Array.prototype.sort is stable, so ties keep first-seen order.
  const books = Array.from(counts.values()).sort((left, right) => right.count - left.count);
  return {
    books: books.slice(0, Math.max(0, limit)),
    totalBooks: books.length
  };
}
