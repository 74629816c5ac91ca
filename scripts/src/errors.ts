export type MetricRulesErrorCode =
  | "INVALID_NAME"
  | "INVALID_VALUE"
  | "NOT_FOUND"
  | "MALFORMED_PATH"
  | "STRUCTURAL_CONFLICT"
  | "DUPLICATE_CHILD"
  | "SHARED_CHILD"
  | "CYCLE"
  | "EMPTY_INPUT"
  | "TYPE_MISMATCH"
  | "RULE_CONFIGURATION"
  | "THRESHOLD_VIOLATION"
  | "STORE";

export class MetricRulesError extends Error {
  public readonly code: MetricRulesErrorCode;

  constructor(message: string, code: MetricRulesErrorCode, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = "MetricRulesError";
    this.code = code;
  }
}

/** Invalid name or value handed to a Metric or CompositeMetric constructor. */
export class MetricConstructionError extends MetricRulesError {
  constructor(message: string, code: "INVALID_NAME" | "INVALID_VALUE") {
    super(message, code);
    this.name = "MetricConstructionError";
  }
}

export class MetricLookupError extends MetricRulesError {
  public readonly keyPath: string;

  constructor(keyPath: string, message: string, code: "NOT_FOUND" | "MALFORMED_PATH" = "NOT_FOUND") {
    super(message, code);
    this.name = "MetricLookupError";
    this.keyPath = keyPath;
  }
}

export class StructuralConflictError extends MetricRulesError {
  constructor(
    message: string,
    code:
      | "STRUCTURAL_CONFLICT"
      | "DUPLICATE_CHILD"
      | "SHARED_CHILD"
      | "CYCLE"
      | "EMPTY_INPUT"
      | "MALFORMED_PATH" = "STRUCTURAL_CONFLICT"
  ) {
    super(message, code);
    this.name = "StructuralConflictError";
  }
}

export class StructuredConversionError extends MetricRulesError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, "TYPE_MISMATCH");
    this.name = "StructuredConversionError";
    this.field = field;
  }
}

export class RuleConfigurationError extends MetricRulesError {
  public readonly source?: string;

  constructor(message: string, source?: string, cause?: unknown) {
    super(source ? `${message} (in ${source})` : message, "RULE_CONFIGURATION", cause);
    this.name = "RuleConfigurationError";
    this.source = source;
  }
}

export class MetricStoreError extends MetricRulesError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORE", cause);
    this.name = "MetricStoreError";
  }
}
