/**
 * HTTP status codes the API answers with.
 * Failures split into caller faults (400) and system or external faults (500).
 */
export enum HttpStatusCode {
  Ok = 200,
  BadRequest = 400,
  InternalServerError = 500,
}

export type FailureStatusCode =
  | HttpStatusCode.BadRequest
  | HttpStatusCode.InternalServerError;
