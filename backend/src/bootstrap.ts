import type { AppConfig } from "./config.js";
import { createResendDelivery } from "./services/deliveryService.js";
import { createJsonHighlightStore } from "./services/highlightStore.js";
import { createLlmThemeClassifier } from "./services/themeClassifier.js";
import type { DigestDelivery, HighlightStore, ThemeClassifier } from "./types.js";

export type Collaborators = {
  store: HighlightStore;
  classifier: ThemeClassifier;
  delivery: DigestDelivery;
};

// Built once per process and handed to the app/job explicitly.
export function createCollaborators(config: AppConfig): Collaborators {
  return {
    store: createJsonHighlightStore(config.storePath),
    classifier: createLlmThemeClassifier({
      provider: config.classifier.provider,
      model: config.classifier.model,
      minConfidence: config.classifier.minConfidence,
      apiKey: config.classifier.apiKeys[config.classifier.provider]
    }),
    delivery: createResendDelivery({ apiKey: config.resendApiKey })
  };
}
