import { PayloadKind } from '../domain/enums';
import { JsonValue } from './json.types';

/**
 * Url-encoded form fields, one value per key
 */
export type FormFields = Readonly<Record<string, string>>;

export interface JsonPayload {
  readonly kind: PayloadKind.JSON;
  readonly value: JsonValue;
  /**
   * Body text the value was parsed from (byte order mark removed)
   */
  readonly text: string;
}

export interface RawPayload {
  readonly kind: PayloadKind.RAW;
  readonly text: string;
  readonly formFields?: FormFields;
}

/**
 * Decoded request body - exactly one variant per request
 */
export type Payload = JsonPayload | RawPayload;
