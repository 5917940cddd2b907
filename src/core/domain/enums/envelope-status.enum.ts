/**
 * Values of the `status` field of a response envelope.
 * HEALTHY is only ever returned by the health endpoint.
 */
export enum EnvelopeStatus {
  SUCCESS = 'success',
  ERROR = 'error',
  HEALTHY = 'healthy',
}
