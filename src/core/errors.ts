export type AuthorizationErrorCode =
  | "AlreadyInitialized"
  | "InvalidThreshold"
  | "DuplicateSigner"
  | "Unauthorized"
  | "IdAlreadyConsumed"
  | "SignatureVerificationFailed"
  | "MalformedProof"
  | "MalformedSignatureBlob"
  | "NotOwnerOfWallet"
  | "InvalidInput";

/**
 * Every failure of the gateway surfaces as one of these. Any state written
 * during the failing call is rolled back before it reaches the caller.
 */
export class AuthorizationError extends Error {
  readonly code: AuthorizationErrorCode;

  constructor(code: AuthorizationErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ? `${code}: ${message}` : code, options);
    this.name = "AuthorizationError";
    this.code = code;
  }
}

export const isAuthorizationError = (
  err: unknown,
  code?: AuthorizationErrorCode,
): err is AuthorizationError =>
  err instanceof AuthorizationError && (code === undefined || err.code === code);
