export class ValidationError extends Error {
  constructor(message = "Validation error") {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message = "Invalid configuration", issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class SchemaError extends ConfigError {
  readonly extractType: string | null;

  constructor(extractType: string | null, issues: string[]) {
    super(
      extractType ? `Invalid ${extractType} schema` : "Invalid schema",
      issues
    );
    this.name = "SchemaError";
    this.extractType = extractType;
  }
}

export type MappingErrorCode =
  | "missing_required_source"
  | "untolerated_null"
  | "invalid_value";

export class MappingError extends Error {
  readonly code: MappingErrorCode;
  readonly column: string;
  readonly value: unknown;

  constructor(code: MappingErrorCode, column: string, value: unknown, message: string) {
    super(message);
    this.name = "MappingError";
    this.code = code;
    this.column = column;
    this.value = value;
  }
}

export class RunFinalizedError extends Error {
  constructor(message = "Run summary has already been finalized.") {
    super(message);
    this.name = "RunFinalizedError";
  }
}
