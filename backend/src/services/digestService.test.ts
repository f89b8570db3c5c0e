import { describe, expect, it, vi } from "vitest";
import { ConfigMissingError } from "../errors.js";
import { createSilentLogger } from "../logger.js";
import { createMemoryHighlightStore, makeHighlight, seededRandom } from "../testing/fixtures.js";
import type { OutgoingDigest } from "../types.js";
import { buildDigestPreview, runDailyDigest } from "./digestService.js";

const logger = createSilentLogger();
const now = () => new Date("2024-01-05T08:00:00.000Z");

const pool = [
  makeHighlight({ title: "Dune", author: "Frank Herbert", text: "Fear is the mind-killer." }),
  makeHighlight({ title: "Emma", author: "Jane Austen", text: "Badly done, Emma!" }),
  makeHighlight({ title: "Deep Work", text: "Focus is the new IQ." })
];

describe("runDailyDigest", () => {
  it("samples, renders and sends", async () => {
    const send = vi.fn(async (_message: OutgoingDigest) => ({ id: "email-1" }));

    const result = await runDailyDigest({
      store: createMemoryHighlightStore(pool),
      delivery: { send },
      logger,
      count: 2,
      to: "reader@example.com",
      from: "Digest <digest@example.com>",
      random: seededRandom(5),
      now,
      timeZone: "UTC"
    });

    expect(result).toEqual({ sent: true, id: "email-1", selected: 2, pool: 3, books: 3 });
    const sent = send.mock.calls[0][0];
    expect(sent.to).toBe("reader@example.com");
    expect(sent.from).toBe("Digest <digest@example.com>");
    expect(sent.subject).toBe("Your Daily Kindle Highlights - January 5");
    expect(sent.html.match(/<div class="highlight">/g)).toHaveLength(2);
  });

  it("checks the destination before loading anything", async () => {
    const store = createMemoryHighlightStore(pool);
    const load = vi.spyOn(store, "load");

    await expect(
      runDailyDigest({
        store,
        delivery: { send: vi.fn() },
        logger,
        count: 2,
        to: "  ",
        from: "Digest <digest@example.com>"
      })
    ).rejects.toBeInstanceOf(ConfigMissingError);
    expect(load).not.toHaveBeenCalled();
  });

  it("skips sending when the store is empty", async () => {
    const send = vi.fn();

    const result = await runDailyDigest({
      store: createMemoryHighlightStore(),
      delivery: { send },
      logger,
      count: 5,
      to: "reader@example.com",
      from: "Digest <digest@example.com>"
    });

    expect(result).toEqual({ sent: false, reason: "empty-store" });
    expect(send).not.toHaveBeenCalled();
  });
});

describe("buildDigestPreview", () => {
  it("renders the selection without sending", async () => {
    const preview = await buildDigestPreview({
      store: createMemoryHighlightStore(pool),
      count: 5,
      random: seededRandom(9),
      now
    });

    expect(preview.selected).toBe(3);
    expect(preview.html).toContain("Fear is the mind-killer.");
    expect(preview.html).toContain("Badly done, Emma!");
  });
});
