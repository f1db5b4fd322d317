// Base error class for all emergency-desk errors
export class EmergencyDeskError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'EmergencyDeskError';
  }
}

// Empty or unusable user input; reported before any network call
export class ValidationError extends EmergencyDeskError {
  readonly kind = 'validation' as const;

  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for invalid or missing environment settings
export class ConfigError extends EmergencyDeskError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Catch-all for failures that fit no other kind (malformed responses, unreadable images)
export class UnexpectedError extends EmergencyDeskError {
  readonly kind = 'unexpected' as const;

  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'UNEXPECTED_ERROR');
    this.name = 'UnexpectedError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
