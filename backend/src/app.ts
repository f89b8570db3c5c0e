import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { HighlightsError } from "./errors.js";
import type { Logger } from "./logger.js";
import { summarizeBooks } from "./services/clippingsParser.js";
import { buildDigestPreview, runDailyDigest } from "./services/digestService.js";
import { importClippings } from "./services/importService.js";
import { applyThemes } from "./services/themeClassifier.js";
import type {
  Clock,
  DigestDelivery,
  HighlightStore,
  RandomSource,
  ThemeClassifier
} from "./types.js";

export type AppDeps = {
  store: HighlightStore;
  classifier: ThemeClassifier;
  delivery: DigestDelivery;
  logger: Logger;
  defaults: {
    count: number;
    to?: string;
    from: string;
    timeZone?: string;
  };
  maxUploadBytes?: number;
  random?: RandomSource;
  now?: Clock;
};

const importSchema = z.object({
  dryRun: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true")
});

const previewSchema = z.object({
  count: z.coerce.number().int().min(0).max(100).optional()
});

const sendSchema = z.object({
  count: z.number().int().min(0).max(100).optional(),
  to: z.string().email().optional()
});

function statusFor(error: HighlightsError): number {
  switch (error.code) {
    case "CONFIG_MISSING":
      return 400;
    case "SOURCE_UNREADABLE":
      return 422;
    case "DELIVERY_FAILED":
    case "CLASSIFICATION_FAILED":
      return 502;
    case "STORE_CORRUPT":
      return 500;
  }
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const log = deps.logger.child({ module: "http" });
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes ?? 10 * 1024 * 1024 }
  });

  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  function sendError(res: Response, error: unknown, fallback: string) {
    if (error instanceof z.ZodError) {
      return res.status(400).json({
        error: "Invalid request.",
        issues: error.issues
      });
    }
    if (error instanceof HighlightsError) {
      const status = statusFor(error);
      if (status >= 500) {
        log.error({ err: error }, fallback);
      }
      return res.status(status).json({ error: error.message, code: error.code });
    }
    log.error({ err: error }, fallback);
    return res.status(500).json({
      error: error instanceof Error ? error.message : fallback
    });
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, now: new Date().toISOString() });
  });

  app.post("/api/import", upload.single("file"), async (req, res) => {
    try {
      const payload = importSchema.parse(req.body ?? {});
      if (!req.file) {
        return res.status(400).json({ error: "Missing file." });
      }
      const report = await importClippings({
        bytes: req.file.buffer,
        store: deps.store,
        logger: deps.logger,
        dryRun: payload.dryRun,
        now: deps.now
      });
      return res.status(report.dryRun ? 200 : 201).json(report);
    } catch (error) {
      return sendError(res, error, "Failed to import clippings.");
    }
  });

  app.get("/api/highlights/stats", async (_req, res) => {
    try {
      const highlights = await deps.store.load();
      const { books, totalBooks } = summarizeBooks(highlights);
      return res.json({
        total: highlights.length,
        totalBooks,
        themed: highlights.filter((highlight) => highlight.theme).length,
        books
      });
    } catch (error) {
      return sendError(res, error, "Failed to read highlights.");
    }
  });

  app.post("/api/themes/classify", async (_req, res) => {
    try {
      const highlights = await deps.store.load();
      const result = await applyThemes(highlights, deps.classifier);
      if (result.classified.length > 0) {
        await deps.store.save(result.highlights);
      }
      log.info({ books: result.classified.length }, "Classified books");
      return res.json({
        classified: result.classified,
        total: result.highlights.length
      });
    } catch (error) {
      return sendError(res, error, "Failed to classify themes.");
    }
  });

  app.get("/api/digest/preview", async (req, res) => {
    try {
      const query = previewSchema.parse(req.query);
      const preview = await buildDigestPreview({
        store: deps.store,
        count: query.count ?? deps.defaults.count,
        random: deps.random,
        now: deps.now,
        timeZone: deps.defaults.timeZone
      });
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.setHeader("Cache-Control", "no-store");
      return res.send(preview.html);
    } catch (error) {
      return sendError(res, error, "Failed to render digest.");
    }
  });

  app.post("/api/digest/send", async (req, res) => {
    try {
      const payload = sendSchema.parse(req.body ?? {});
      const result = await runDailyDigest({
        store: deps.store,
        delivery: deps.delivery,
        logger: deps.logger,
        count: payload.count ?? deps.defaults.count,
        to: payload.to ?? deps.defaults.to,
        from: deps.defaults.from,
        random: deps.random,
        now: deps.now,
        timeZone: deps.defaults.timeZone
      });
      return res.status(result.sent ? 201 : 200).json(result);
    } catch (error) {
      return sendError(res, error, "Failed to send digest.");
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      return res.status(error.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ error: error.message });
    }
    return sendError(res, error, "Request failed.");
  });

  return app;
}
