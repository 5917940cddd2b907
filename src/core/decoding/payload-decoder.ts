import { PayloadKind } from '../domain/enums';
import { MalformedPayloadError } from '../errors';
import { FormFields, HeaderMap, JsonValue, Payload } from '../interfaces';
import { getHeader } from '../request/headers';

const JSON_MEDIA_TYPE = 'application/json';
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Whether a Content-Type value declares a JSON body.
 * Case-insensitive; parameters such as charset do not matter.
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  return (contentType ?? '').toLowerCase().includes(JSON_MEDIA_TYPE);
}

/**
 * Decode a request body into a Payload.
 *
 * JSON-declared bodies are parsed and MalformedPayloadError is thrown when
 * they are empty or invalid; every other body becomes raw UTF-8 text
 * (invalid sequences replaced) with the form fields the transport parsed.
 */
export function decode(
  headers: HeaderMap,
  body: Buffer,
  formFields?: FormFields,
): Payload {
  if (isJsonContentType(getHeader(headers, 'content-type'))) {
    const text = stripByteOrderMark(body.toString('utf8'));
    return { kind: PayloadKind.JSON, value: parseJson(text), text };
  }

  const text = body.toString('utf8');
  return formFields
    ? { kind: PayloadKind.RAW, text, formFields }
    : { kind: PayloadKind.RAW, text };
}

function stripByteOrderMark(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

function parseJson(text: string): JsonValue {
  if (text.trim().length === 0) {
    throw new MalformedPayloadError('Request body is empty');
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError(
      'Request body is not valid JSON',
      error instanceof Error ? error : undefined,
    );
  }
}
