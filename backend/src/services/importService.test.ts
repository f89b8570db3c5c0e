import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceUnreadableError } from "../errors.js";
import { createSilentLogger } from "../logger.js";
import { createMemoryHighlightStore, makeHighlight, SAMPLE_CLIPPINGS } from "../testing/fixtures.js";
import { readClippingsFile } from "./clippingsParser.js";
import { createJsonHighlightStore } from "./highlightStore.js";
import { importClippings, importClippingsFile } from "./importService.js";

const logger = createSilentLogger();
const now = () => new Date("2024-02-01T10:00:00.000Z");
const bytes = new TextEncoder().encode(SAMPLE_CLIPPINGS);

describe("importClippings", () => {
  it("parses, merges and saves once", async () => {
    const store = createMemoryHighlightStore([makeHighlight({ title: "Emma", text: "Badly done." })]);

    const report = await importClippings({ bytes, store, logger, now });

    expect(report).toMatchObject({
      dryRun: false,
      parsed: 2,
      skipped: { empty: 1, bookmark: 1, note: 1 },
      totalBooks: 2,
      added: 2,
      total: 3
    });
    expect(report.books).toEqual([
      { title: "Deep Work", author: "Cal Newport", count: 1 },
      { title: "Meditations", author: "Marcus Aurelius", count: 1 }
    ]);
    expect(report.importId).toMatch(/^[0-9a-f-]{36}$/);
    expect(store.saveCount()).toBe(1);
    expect(store.snapshot()[2]).toEqual({
      title: "Meditations",
      author: "Marcus Aurelius",
      text: "You have power over your mind,\nnot outside events.",
      location: "130-130",
      added_at: "2024-02-01T10:00:00.000Z"
    });
  });

  it("adds nothing when the same file is imported again", async () => {
    const store = createMemoryHighlightStore();
    await importClippings({ bytes, store, logger, now });

    const second = await importClippings({ bytes, store, logger, now });

    expect(second.added).toBe(0);
    expect(second.total).toBe(2);
  });

  it("reports without saving on a dry run", async () => {
    const store = createMemoryHighlightStore();

    const report = await importClippings({ bytes, store, logger, now, dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.added).toBe(2);
    expect(store.saveCount()).toBe(0);
    expect(store.snapshot()).toEqual([]);
  });

  it("fails without touching the store when nothing could be parsed", async () => {
    const store = createMemoryHighlightStore();
    const onlyBookmarks = new TextEncoder().encode(
      "Dune (Frank Herbert)\n- Your Bookmark on location 4\n\n==========\n"
    );

    await expect(importClippings({ bytes: onlyBookmarks, store, logger, now })).rejects.toBeInstanceOf(
      SourceUnreadableError
    );
    expect(store.saveCount()).toBe(0);
  });
});

describe("importClippingsFile", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "clippings-import-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("imports a clippings file from disk into the JSON store", async () => {
    const filePath = path.join(dir, "My Clippings.txt");
    const storePath = path.join(dir, "data", "highlights.json");
    await fs.writeFile(filePath, `\uFEFF${SAMPLE_CLIPPINGS}`, "utf8");
    const store = createJsonHighlightStore(storePath);

    const report = await importClippingsFile({ filePath, store, logger, now });

    expect(report.added).toBe(2);
    const saved = await store.load();
    expect(saved.map((highlight) => highlight.title)).toEqual(["Deep Work", "Meditations"]);
  });

  it("fails with the original error attached when the file is missing", async () => {
    const filePath = path.join(dir, "missing.txt");
    const store = createMemoryHighlightStore();

    const failure = importClippingsFile({ filePath, store, logger, now });

    await expect(failure).rejects.toBeInstanceOf(SourceUnreadableError);
    await expect(failure).rejects.toThrow(`Clippings file not found: ${filePath}`);
    await expect(failure).rejects.toHaveProperty("cause.code", "ENOENT");
    expect(store.saveCount()).toBe(0);
  });

  it("reports a directory path as unreadable", async () => {
    await expect(readClippingsFile(dir)).rejects.toThrow(`Clippings path is a directory: ${dir}`);
  });
});
