/**
 * Request headers with lower-cased names and one value per name
 */
export type HeaderMap = Readonly<Record<string, string>>;

/**
 * Immutable view of one inbound HTTP request.
 * Created per request and discarded once the response is sent.
 */
export interface IncomingRequest {
  /**
   * Correlation id used in log lines for this request
   */
  readonly id: string;
  readonly method: string;
  readonly path: string;
  readonly headers: HeaderMap;
  readonly body: Buffer;
  readonly remoteAddress?: string;
  readonly receivedAt: Date;
}
