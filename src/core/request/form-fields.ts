import busboy from 'busboy';
import { UnreadableBodyError } from '../errors';
import { FormFields, HeaderMap } from '../interfaces';
import { getHeader, mediaType } from './headers';

const FORM_MEDIA_TYPES = new Set(['application/x-www-form-urlencoded', 'multipart/form-data']);

export function isFormContentType(headers: HeaderMap): boolean {
  return FORM_MEDIA_TYPES.has(mediaType(headers));
}

/**
 * Read the fields of a url-encoded or multipart body.
 *
 * File parts are skipped and the first value wins for repeated names.
 * Bodies of any other type, and forms without fields, yield undefined.
 */
export function readFormFields(headers: HeaderMap, body: Buffer): Promise<FormFields | undefined> {
  const contentType = getHeader(headers, 'content-type');
  if (contentType === undefined || !isFormContentType(headers)) {
    return Promise.resolve(undefined);
  }

  return new Promise((resolve, reject) => {
    const fields = new Map<string, string>();
    const fail = (error: unknown) =>
      reject(
        new UnreadableBodyError(
          'Form body could not be parsed',
          error instanceof Error ? error : undefined,
        ),
      );

    try {
      const parser = busboy({ headers: { 'content-type': contentType } });

      parser.on('field', (name, value) => {
        if (!fields.has(name)) {
          fields.set(name, value);
        }
      });
      parser.on('file', (_name, stream) => {
        stream.resume();
      });
      parser.on('close', () => {
        resolve(fields.size > 0 ? Object.fromEntries(fields) : undefined);
      });
      parser.on('error', fail);

      parser.end(body);
    } catch (error) {
      fail(error);
    }
  });
}
