export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(413, 'PAYLOAD_TOO_LARGE', message);
  }
}

/** Invalid startup configuration (env or rules file). Never raised per request. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'CONFIGURATION_ERROR', message, details);
  }
}
