/**
 * Shape of a decoded request body, chosen from the Content-Type header
 */
export enum PayloadKind {
  /**
   * Body declared as application/json and parsed into a JSON tree
   */
  JSON = 'json',

  /**
   * Any other body: UTF-8 text plus url-encoded form fields when present
   */
  RAW = 'raw',
}
