import "dotenv/config";
import { createApp } from "./app.js";
import { createCollaborators } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, pretty: config.pretty });
const collaborators = createCollaborators(config);

const app = createApp({
  ...collaborators,
  logger,
  maxUploadBytes: config.maxUploadBytes,
  defaults: {
    count: config.highlightsCount,
    to: config.toEmail,
    from: config.fromEmail,
    timeZone: config.timeZone
  }
});

app.listen(config.port, () => {
  logger.info({ store: collaborators.store.describe() }, `Backend listening on http://localhost:${config.port}`);
});
