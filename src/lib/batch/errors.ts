/** Raised before any Provider call when the batch configuration is unusable */
export class BatchValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BatchValidationError";
  }
}

/** Raised when an uploaded file cannot be read as an address dataset */
export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

export function isValidationError(error: unknown): error is BatchValidationError | DatasetError {
  return error instanceof BatchValidationError || error instanceof DatasetError;
}
