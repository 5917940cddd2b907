import { PayloadKind } from '../domain/enums';
import { jsonKind, Payload, PayloadSummary, PayloadTypeTag } from '../interfaces';

/**
 * Serialized form of a payload, used for logging and size measurement.
 * JSON payloads are measured by their body text; the parsed tree is never
 * stringified again.
 */
export function serializePayload(payload: Payload): string {
  if (payload.kind === PayloadKind.JSON) {
    return payload.text;
  }

  return JSON.stringify({
    raw_data: payload.text,
    form_data: payload.formFields ?? null,
  });
}

export function payloadTypeTag(payload: Payload): PayloadTypeTag {
  if (payload.kind === PayloadKind.JSON) {
    return jsonKind(payload.value);
  }
  return payload.formFields ? 'form' : 'raw';
}

/**
 * Business-agnostic summary of a payload: when it was received, its
 * serialized length, and a coarse type tag
 */
export function summarizePayload(
  payload: Payload,
  receivedAt: Date,
  serialized: string = serializePayload(payload),
): PayloadSummary {
  return {
    received_at: receivedAt.toISOString(),
    payload_size: serialized.length,
    payload_type: payloadTypeTag(payload),
  };
}
