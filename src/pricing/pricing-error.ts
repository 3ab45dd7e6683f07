export const PRICING_ERROR_STATUS = {
  INVALID_REQUEST: 400,
  PROVIDER_NOT_SUPPORTED: 400,
  MODEL_NOT_FOUND: 400,
  PRICING_VERSION_NOT_FOUND: 400,
  UNSUPPORTED_DIMENSION: 400,
  INTERNAL_ERROR: 500,
} as const;

export type PricingErrorCode = keyof typeof PRICING_ERROR_STATUS;

export type PricingErrorDetails = Record<string, unknown>;

export type PricingErrorOptions = {
  statusCode?: number;
  details?: PricingErrorDetails;
};

export type ErrorBody = {
  code: PricingErrorCode;
  message: string;
  details: PricingErrorDetails;
};

export type ErrorPayload = {
  error: ErrorBody;
};

const INTERNAL_ERROR_MESSAGE = 'Internal error';

/**
 * Structured domain error. `message` and `details` are safe to show to callers
 * as they are.
 */
export class PricingError extends Error {
  public readonly code: PricingErrorCode;
  public readonly statusCode: number;
  public readonly details: PricingErrorDetails;

  public constructor(code: PricingErrorCode, message: string, options: PricingErrorOptions = {}) {
    super(message);
    this.name = 'PricingError';
    this.code = code;
    this.statusCode = options.statusCode ?? PRICING_ERROR_STATUS[code];
    this.details = options.details ?? {};
  }

  public toBody(): ErrorBody {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** Raised while loading registry files; the registry must not be used afterwards. */
export class RegistryLoadError extends Error {
  public readonly fileName: string;

  public constructor(fileName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryLoadError';
    this.fileName = fileName;
  }
}

export function toErrorPayload(error: PricingError): ErrorPayload {
  return { error: error.toBody() };
}

export function normalizeError(error: unknown): PricingError {
  if (error instanceof PricingError) {
    return error;
  }

  return new PricingError('INTERNAL_ERROR', INTERNAL_ERROR_MESSAGE);
}
