import "dotenv/config";
import { loadConfig, requireValue } from "../config.js";
import { createLogger } from "../logger.js";
import { createJsonHighlightStore } from "../services/highlightStore.js";
import { importClippingsFile } from "../services/importService.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.pretty }).child({
    module: "import-clippings"
  });

  const filePath = requireValue("CLIPPINGS_FILE", config.clippingsFile);
  const report = await importClippingsFile({
    filePath,
    store: createJsonHighlightStore(config.storePath),
    logger,
    dryRun: config.importDryRun
  });

  logger.info(
    { added: report.added, total: report.total, skipped: report.skipped, books: report.totalBooks },
    report.dryRun ? "Dry run - no changes made" : "Import finished"
  );
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
