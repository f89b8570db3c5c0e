import "dotenv/config";
import { createCollaborators } from "../bootstrap.js";
import { loadConfig, requireValue } from "../config.js";
import { createLogger } from "../logger.js";
import { runDailyDigest } from "../services/digestService.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.pretty }).child({
    module: "daily-digest"
  });

  // Fail on missing delivery settings before touching the store.
  const to = requireValue("TO_EMAIL", config.toEmail);
  requireValue("RESEND_API_KEY", config.resendApiKey);

  const { store, delivery } = createCollaborators(config);
  const result = await runDailyDigest({
    store,
    delivery,
    logger,
    count: config.highlightsCount,
    to,
    from: config.fromEmail,
    timeZone: config.timeZone
  });

  if (!result.sent) {
    logger.warn({ reason: result.reason }, "Digest not sent");
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
