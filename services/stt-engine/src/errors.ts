export type SttErrorCode = "invalid_model" | "invalid_parameter" | "unsupported_media" | "payload_too_large";

/**
 * Errors a caller can fix by changing the request. Anything else thrown out of
 * the engine (model loading, whisper.cpp failures) is left untranslated.
 */
export class SttError extends Error {
  constructor(
    message: string,
    readonly code: SttErrorCode,
    readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidModelError extends SttError {
  constructor(readonly model: string, allowed: readonly string[]) {
    super(`Unknown model "${model}". Available: ${allowed.join(", ")}`, "invalid_model", 422);
  }
}

export class InvalidParameterError extends SttError {
  constructor(readonly parameter: string, message: string) {
    super(message, "invalid_parameter", 422);
  }
}

export class UnsupportedMediaError extends SttError {
  constructor(message: string) {
    super(message, "unsupported_media", 415);
  }
}

export class PayloadTooLargeError extends SttError {
  constructor(readonly limitBytes: number, message: string) {
    super(message, "payload_too_large", 413);
  }
}
