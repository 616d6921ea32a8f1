export type EssayErrorCode =
  | "CONFIG"
  | "UNSUPPORTED_FORMAT"
  | "DOCUMENT_READ"
  | "SELECTION"
  | "MODEL_REQUEST"
  | "MODEL_RESPONSE"
  | "SAVE"
  | "INPUT_CLOSED";

export class EssayEditorError extends Error {
  readonly code: EssayErrorCode;

  constructor(code: EssayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends EssayEditorError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export class UnsupportedFormatError extends EssayEditorError {
  readonly extension: string;

  constructor(extension: string) {
    super(
      "UNSUPPORTED_FORMAT",
      `Unsupported file format: ${extension || "(none)"}. Use .txt, .docx or .pdf.`
    );
    this.extension = extension;
  }
}

export class DocumentReadError extends EssayEditorError {
  constructor(message: string, cause?: unknown) {
    super("DOCUMENT_READ", message, { cause });
  }
}

/** Raised for user selections that can be retried; never fatal. */
export class SelectionError extends EssayEditorError {
  constructor(message: string) {
    super("SELECTION", message);
  }
}

export class ModelRequestError extends EssayEditorError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super("MODEL_REQUEST", `${provider} request failed: ${message}`, { cause });
    this.provider = provider;
  }
}

export class ModelResponseError extends EssayEditorError {
  constructor(message: string) {
    super("MODEL_RESPONSE", message);
  }
}

export class SaveError extends EssayEditorError {
  constructor(message: string, cause?: unknown) {
    super("SAVE", message, { cause });
  }
}

export class InputClosedError extends EssayEditorError {
  constructor() {
    super("INPUT_CLOSED", "Input closed.");
  }
}

export function describeError(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
