import { EnvelopeStatus, EventHandlerTag, OutcomeType } from '../domain/enums';
import { JsonKind } from './json.types';

/**
 * Coarse type tag of a decoded payload
 */
export type PayloadTypeTag = JsonKind | 'raw' | 'form';

/**
 * Generic-path processing summary, returned as envelope data
 */
export interface PayloadSummary {
  received_at: string;
  payload_size: number;
  payload_type: PayloadTypeTag;
}

/**
 * Provider-path processing summary, returned as envelope data
 */
export interface ProviderEventSummary {
  provider: string;
  event_type: string | null;
  handler: EventHandlerTag;
  handled: boolean;
  delivery_id: string | null;
  signature_verified: boolean;
  payload_type: PayloadTypeTag;
}

export type EnvelopeData = PayloadSummary | ProviderEventSummary;

/**
 * Uniform response body returned by every endpoint
 */
export interface ResponseEnvelope {
  status: EnvelopeStatus;
  message: string;
  timestamp: string;
  data?: EnvelopeData;
}

/**
 * Envelope and HTTP status, always produced together
 */
export interface GatewayResponse {
  envelope: ResponseEnvelope;
  httpStatus: number;
}

export type GatewayOutcome =
  | { type: OutcomeType.ACCEPTED; message: string; data: EnvelopeData }
  | { type: OutcomeType.MALFORMED_PAYLOAD }
  | { type: OutcomeType.SIGNATURE_REJECTED }
  | { type: OutcomeType.UNKNOWN_PROVIDER; provider: string }
  | { type: OutcomeType.NOT_FOUND; method: string; path: string }
  | { type: OutcomeType.PAYLOAD_TOO_LARGE }
  | { type: OutcomeType.UNREADABLE_BODY }
  | { type: OutcomeType.INTERNAL_FAILURE; message?: string };
