/**
 * Request handling outcomes - each maps to exactly one HTTP status
 */
export enum OutcomeType {
  /**
   * Payload decoded and processed (generic or provider path)
   */
  ACCEPTED = 'accepted',

  /**
   * Body declared as JSON but could not be parsed
   */
  MALFORMED_PAYLOAD = 'malformed_payload',

  /**
   * Signature verification enabled and the signature did not match
   */
  SIGNATURE_REJECTED = 'signature_rejected',

  /**
   * No adapter registered for the requested provider
   */
  UNKNOWN_PROVIDER = 'unknown_provider',

  /**
   * No route matched the request
   */
  NOT_FOUND = 'not_found',

  /**
   * Body exceeded the configured size limit
   */
  PAYLOAD_TOO_LARGE = 'payload_too_large',

  /**
   * Body stream could not be read (aborted, bad encoding)
   */
  UNREADABLE_BODY = 'unreadable_body',

  /**
   * Anything unexpected
   */
  INTERNAL_FAILURE = 'internal_failure',
}
