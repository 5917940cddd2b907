import { v4 as uuidv4 } from 'uuid';
import { IncomingRequest } from '../interfaces';
import { normalizeHeaders, RawHeaders } from './headers';

export interface IncomingRequestInit {
  id?: string;
  method: string;
  path: string;
  headers: RawHeaders;
  body: Buffer;
  remoteAddress?: string;
  receivedAt?: Date;
}

/**
 * Build the immutable per-request view handed to the gateway
 */
export function createIncomingRequest(init: IncomingRequestInit): IncomingRequest {
  return Object.freeze({
    id: init.id ?? uuidv4(),
    method: init.method.toUpperCase(),
    path: init.path,
    headers: normalizeHeaders(init.headers),
    body: init.body,
    remoteAddress: init.remoteAddress,
    receivedAt: init.receivedAt ?? new Date(),
  });
}
