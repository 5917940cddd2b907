import { EnvelopeStatus, OutcomeType } from '../domain/enums';
import {
  MalformedPayloadError,
  SignatureVerificationError,
  UnknownProviderError,
  UnreadableBodyError,
} from '../errors';
import { GatewayOutcome, GatewayResponse } from '../interfaces';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * HTTP status for every outcome
 */
export const OUTCOME_HTTP_STATUS: Readonly<Record<OutcomeType, number>> = {
  [OutcomeType.ACCEPTED]: 200,
  [OutcomeType.MALFORMED_PAYLOAD]: 400,
  [OutcomeType.UNREADABLE_BODY]: 400,
  [OutcomeType.SIGNATURE_REJECTED]: 401,
  [OutcomeType.UNKNOWN_PROVIDER]: 404,
  [OutcomeType.NOT_FOUND]: 404,
  [OutcomeType.PAYLOAD_TOO_LARGE]: 413,
  [OutcomeType.INTERNAL_FAILURE]: 500,
};

export const DEFAULT_INTERNAL_FAILURE_MESSAGE = 'Internal server error';

/**
 * Builds the uniform response envelope and its HTTP status.
 * Data is attached on success only; error envelopes never carry detail
 * beyond a fixed message.
 */
export class ResponseBuilder {
  constructor(private readonly clock: Clock = systemClock) {}

  build(outcome: GatewayOutcome): GatewayResponse {
    const httpStatus = OUTCOME_HTTP_STATUS[outcome.type];
    const timestamp = this.clock().toISOString();

    if (outcome.type === OutcomeType.ACCEPTED) {
      return {
        httpStatus,
        envelope: {
          status: EnvelopeStatus.SUCCESS,
          message: outcome.message,
          timestamp,
          data: outcome.data,
        },
      };
    }

    return {
      httpStatus,
      envelope: {
        status: EnvelopeStatus.ERROR,
        message: errorMessage(outcome),
        timestamp,
      },
    };
  }

  health(message: string): GatewayResponse {
    return {
      httpStatus: 200,
      envelope: {
        status: EnvelopeStatus.HEALTHY,
        message,
        timestamp: this.clock().toISOString(),
      },
    };
  }
}

function errorMessage(outcome: Exclude<GatewayOutcome, { type: OutcomeType.ACCEPTED }>): string {
  switch (outcome.type) {
    case OutcomeType.MALFORMED_PAYLOAD:
      return 'Invalid JSON format';
    case OutcomeType.SIGNATURE_REJECTED:
      return 'Invalid webhook signature';
    case OutcomeType.UNKNOWN_PROVIDER:
      return `Unknown webhook provider: ${outcome.provider}`;
    case OutcomeType.NOT_FOUND:
      return `Route not found: ${outcome.method} ${outcome.path}`;
    case OutcomeType.PAYLOAD_TOO_LARGE:
      return 'Payload too large';
    case OutcomeType.UNREADABLE_BODY:
      return 'Request body could not be read';
    case OutcomeType.INTERNAL_FAILURE:
      return outcome.message ?? DEFAULT_INTERNAL_FAILURE_MESSAGE;
  }
}

/**
 * Map a caught error onto an outcome. Anything that is not a known
 * GatewayError becomes an internal failure with the given message.
 */
export function outcomeFromError(
  error: unknown,
  internalFailureMessage: string = DEFAULT_INTERNAL_FAILURE_MESSAGE,
): GatewayOutcome {
  if (error instanceof MalformedPayloadError) {
    return { type: OutcomeType.MALFORMED_PAYLOAD };
  }
  if (error instanceof UnreadableBodyError) {
    return { type: OutcomeType.UNREADABLE_BODY };
  }
  if (error instanceof SignatureVerificationError) {
    return { type: OutcomeType.SIGNATURE_REJECTED };
  }
  if (error instanceof UnknownProviderError) {
    return { type: OutcomeType.UNKNOWN_PROVIDER, provider: error.provider };
  }
  return { type: OutcomeType.INTERNAL_FAILURE, message: internalFailureMessage };
}
