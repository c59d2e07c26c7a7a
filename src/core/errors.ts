export class SMTPError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SMTPDisconnectedError extends SMTPError {}

export class SMTPTimeoutError extends SMTPError {}

// a reply line that does not start with a 3-digit code
export class SMTPProtocolError extends SMTPError {}

export class SMTPResponseError extends SMTPError {
  constructor(
    public readonly code: number,
    public readonly response: string
  ) {
    super(`unexpected code: ${code}: ${response}`);
  }
}

/**
 * Base class of everything the verification layer can fail with. A verdict,
 * even an "invalid" one, is never reported through these.
 */
export class VerificationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedAddressError extends VerificationError {}

export class ResolutionFailedError extends VerificationError {}

export type ServerFailure = { host: string; error: unknown };

export class NoUsableServerError extends VerificationError {
  constructor(message: string, public readonly failures: ServerFailure[]) {
    super(message);
  }
}

export class HandshakeFailedError extends VerificationError {}

export class SenderRejectedError extends VerificationError {}

export class ProtocolError extends VerificationError {}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new SMTPError("operation aborted");
}
