export type HighlightsErrorCode =
  | "SOURCE_UNREADABLE"
  | "STORE_CORRUPT"
  | "CONFIG_MISSING"
  | "DELIVERY_FAILED"
  | "CLASSIFICATION_FAILED";

export class HighlightsError extends Error {
  readonly code: HighlightsErrorCode;

  constructor(code: HighlightsErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HighlightsError";
    this.code = code;
  }
}

export class SourceUnreadableError extends HighlightsError {
  constructor(message: string, options?: ErrorOptions) {
    super("SOURCE_UNREADABLE", message, options);
    this.name = "SourceUnreadableError";
  }
}

export class StoreCorruptError extends HighlightsError {
  readonly storePath: string;

  constructor(storePath: string, message: string, options?: ErrorOptions) {
    super("STORE_CORRUPT", `${message} (${storePath})`, options);
    this.name = "StoreCorruptError";
    this.storePath = storePath;
  }
}

export class ConfigMissingError extends HighlightsError {
  readonly key: string;

  constructor(key: string) {
    super("CONFIG_MISSING", `${key} is required.`);
    this.name = "ConfigMissingError";
    this.key = key;
  }
}

export class DeliveryError extends HighlightsError {
  constructor(message: string, options?: ErrorOptions) {
    super("DELIVERY_FAILED", message, options);
    this.name = "DeliveryError";
  }
}

export class ClassificationError extends HighlightsError {
  constructor(message: string, options?: ErrorOptions) {
    super("CLASSIFICATION_FAILED", message, options);
    this.name = "ClassificationError";
  }
}
