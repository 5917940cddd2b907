/**
 * Base class for errors the gateway recovers from and maps to a response
 */
export abstract class GatewayError extends Error {
  abstract readonly httpStatus: number;

  constructor(
    message: string,
    public readonly reason?: Error,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Body declared as JSON but not parseable as JSON
 */
export class MalformedPayloadError extends GatewayError {
  readonly httpStatus = 400;
}

/**
 * Body could not be read in the form its content type declares
 */
export class UnreadableBodyError extends GatewayError {
  readonly httpStatus = 400;
}

/**
 * Signature verification enabled and the request failed it
 */
export class SignatureVerificationError extends GatewayError {
  readonly httpStatus = 401;

  constructor(
    message: string,
    public readonly provider: string,
  ) {
    super(message);
  }
}

/**
 * No adapter registered under the requested provider name
 */
export class UnknownProviderError extends GatewayError {
  readonly httpStatus = 404;

  constructor(public readonly provider: string) {
    super(`Unknown webhook provider: ${provider}`);
  }
}
