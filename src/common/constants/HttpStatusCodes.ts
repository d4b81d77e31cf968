/**
 * HTTP status codes used by the API routes.
 */
enum HttpStatusCodes {
  OK = 200,
  CREATED = 201,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  PAYLOAD_TOO_LARGE = 413,
  BAD_GATEWAY = 502,
}

export default HttpStatusCodes;
