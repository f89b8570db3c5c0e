import { ConfigMissingError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Clock, DigestDelivery, HighlightStore, RandomSource } from "../types.js";
import { renderDigest } from "./digestRenderer.js";
import { sampleHighlights } from "./sampler.js";

export type DigestRunResult =
  | { sent: true; id: string; selected: number; pool: number; books: number }
  | { sent: false; reason: "empty-store" };

type DigestArgs = {
  store: HighlightStore;
  delivery: DigestDelivery;
  logger: Logger;
  count: number;
  to?: string;
  from: string;
  random?: RandomSource;
  now?: Clock;
  timeZone?: string;
};

export async function buildDigestPreview(args: {
  store: HighlightStore;
  count: number;
  random?: RandomSource;
  now?: Clock;
  timeZone?: string;
}): Promise<{ html: string; subject: string; selected: number }> {
  const pool = await args.store.load();
  const selection = sampleHighlights(pool, args.count, args.random);
  const date = args.now ? args.now() : new Date();
  const document = renderDigest(selection, { date, timeZone: args.timeZone });
  return { html: document.html, subject: document.subject, selected: selection.length };
}

export async function runDailyDigest(args: DigestArgs): Promise<DigestRunResult> {
  const to = args.to?.trim();
  if (!to) {
    throw new ConfigMissingError("TO_EMAIL");
  }

  const pool = await args.store.load();
  if (pool.length === 0) {
    args.logger.warn("No highlights in the store; run an import first.");
    return { sent: false, reason: "empty-store" };
  }

  const books = new Set(pool.map((highlight) => highlight.title)).size;
  const selection = sampleHighlights(pool, args.count, args.random);
  const date = args.now ? args.now() : new Date();
  const document = renderDigest(selection, { date, timeZone: args.timeZone });

  args.logger.info({ pool: pool.length, books, selected: selection.length }, "Sending digest");
  const { id } = await args.delivery.send({ ...document, to, from: args.from });
  args.logger.info({ id }, "Digest sent");

  return { sent: true, id, selected: selection.length, pool: pool.length, books };
}
