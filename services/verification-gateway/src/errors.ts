export type VerificationErrorCode =
  | "REQUEST_INVALID"
  | "UPSTREAM_ERROR"
  | "EXTRACTION_FAILURE"
  | "SCHEMA_VIOLATION";

export class VerificationError extends Error {
  public readonly code: VerificationErrorCode;

  constructor(code: VerificationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VerificationError";
    this.code = code;
  }
}

export class RequestInvalidError extends VerificationError {
  constructor(message: string) {
    super("REQUEST_INVALID", message);
    this.name = "RequestInvalidError";
  }
}

export class UpstreamError extends VerificationError {
  public readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("UPSTREAM_ERROR", message, options);
    this.name = "UpstreamError";
    this.status = status;
  }
}

export class ExtractionError extends VerificationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXTRACTION_FAILURE", message, options);
    this.name = "ExtractionError";
  }
}

export class SchemaViolationError extends VerificationError {
  public readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super("SCHEMA_VIOLATION", message);
    this.name = "SchemaViolationError";
    this.fields = fields;
  }
}
