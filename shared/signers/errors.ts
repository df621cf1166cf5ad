export const SignerErrorCode = {
  UNKNOWN_KEY: 'UNKNOWN_KEY',
  UNSUPPORTED_ALGORITHM: 'UNSUPPORTED_ALGORITHM',
  INVALID_DERIVATION_PATH: 'INVALID_DERIVATION_PATH',
  COMPUTATION_FAILURE: 'COMPUTATION_FAILURE',
} as const;

export type SignerErrorCodeType = (typeof SignerErrorCode)[keyof typeof SignerErrorCode];

export function isSignerErrorCode(value: string): value is SignerErrorCodeType {
  return Object.values(SignerErrorCode).some((code) => code === value);
}

/**
 * Error raised by signer adapters. Callers branch on `code`.
 */
export class SignerError extends Error {
  readonly code: SignerErrorCodeType;

  constructor(code: SignerErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SignerError';
    this.code = code;
  }
}

export function isSignerError(error: unknown): error is SignerError {
  return error instanceof SignerError;
}
