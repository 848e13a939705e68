/**
 * Base class for errors the HTTP layer knows how to turn into a client-facing
 * status. Anything else is reported as an internal error.
 */
export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The credential or identity was rejected, either upstream (external auth,
 * Matrix token errors) or because it could not be resolved at all.
 */
export class AuthenticationError extends BridgeError {}

export class InvalidSenderError extends AuthenticationError {
  constructor(public readonly identifier: string) {
    super(`Sender ${identifier || '(empty)'} is not resolvable to a Matrix user`);
  }
}

export class InvalidRecipientError extends BridgeError {
  constructor(public readonly identifier: string) {
    super(`Recipient ${identifier || '(empty)'} is not resolvable to a Matrix user or room`);
  }
}

export class InvalidRequestError extends BridgeError {}

export class MappingNotFoundError extends BridgeError {
  constructor(public readonly key: string) {
    super(`No mapping found for ${key}`);
  }
}

/**
 * A collaborator (homeserver, credential service, push service) failed for a
 * reason other than authentication.
 */
export class UpstreamError extends BridgeError {}

/**
 * A failed call into the Matrix homeserver, normalized from whatever the SDK
 * rejected with.
 */
export class WireError extends Error {
  constructor(
    message: string,
    public readonly errcode: string | null = null,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'WireError';
  }

  hasCode(...codes: string[]): boolean {
    return this.errcode !== null && codes.includes(this.errcode);
  }
}

/**
 * The push service no longer accepts the device token.
 */
export class PushTokenInvalidError extends Error {
  constructor(public readonly deviceToken: string) {
    super('Push token no longer valid');
    this.name = 'PushTokenInvalidError';
  }
}

export class PushDeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PushDeliveryError';
  }
}

/**
 * Matrix errcodes that mean the access token used for the call is unknown or
 * missing. These are surfaced as `AuthenticationError`.
 */
const AUTH_ERRCODES = ['M_UNKNOWN_TOKEN', 'M_MISSING_TOKEN'];

/**
 * Maps a wire failure to the bridge's taxonomy: token errors become
 * `AuthenticationError`, anything else is wrapped in an `UpstreamError` with
 * `context` prepended to the message.
 */
export function mapWireError(context: string, e: unknown): BridgeError {
  if (e instanceof BridgeError) {
    return e;
  }
  if (e instanceof WireError && e.hasCode(...AUTH_ERRCODES)) {
    return new AuthenticationError(`${context}: ${e.message}`, { cause: e });
  }
  return new UpstreamError(`${context}: ${errorMessage(e)}`, { cause: e });
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
