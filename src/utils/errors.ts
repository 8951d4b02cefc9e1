export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class InvalidDateFormatError extends HttpError {
  constructor(message = 'Invalid date format. Use YYYY-MM-DD.') {
    super(400, message);
  }
}

export class DateOutOfRangeError extends HttpError {
  constructor(isoDate: string, deltaDays: number) {
    super(400, `Date out of range: ${isoDate} + ${deltaDays} days is past 9999-12-31.`);
  }
}

export class ModelUnavailableError extends HttpError {
  constructor(modelLabel: string, loadError: string | null) {
    super(500, `${modelLabel} model not loaded. ${loadError || ''}`.trim());
  }
}

export class InferenceFailureError extends HttpError {
  constructor(task: string, cause: unknown) {
    super(500, `Inference error (${task}): ${describeError(cause)}`);
  }
}

// Load-time failures never reach a client directly; they become ModelStatus.loadError.
export class ModelNotFoundError extends Error {
  constructor(modelPath: string) {
    super(`Model file not found: ${modelPath}`);
    this.name = 'ModelNotFoundError';
  }
}

export class ModelFormatError extends Error {
  constructor(modelPath: string, detail: string) {
    super(`Model file is not a valid artifact: ${modelPath} (${detail})`);
    this.name = 'ModelFormatError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
