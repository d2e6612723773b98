export class PipelineError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

export class DatasetLoadError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "DATASET_LOAD_ERROR", cause });
  }
}

export class SchemaError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "SCHEMA_ERROR", cause });
  }
}

export class SplitError extends PipelineError {
  constructor(message: string) {
    super(message, { code: "SPLIT_ERROR" });
  }
}

/** A label value that cannot be written as a number. Fatal for the whole run. */
export class LabelCoercionError extends PipelineError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, { code: "LABEL_COERCION_ERROR" });
    this.field = field;
  }

  static unconvertible(field: string, rendered: string): LabelCoercionError {
    return new LabelCoercionError(field, `could not convert value of field "${field}" to float: ${rendered}`);
  }

  static nonFinite(field: string, value: number): LabelCoercionError {
    return new LabelCoercionError(field, `label from field "${field}" is not a finite number: ${value}`);
  }
}

export class ValidationFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "VALIDATION_ERROR", cause });
  }
}
