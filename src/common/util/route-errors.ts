import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';

/******************************************************************************
                                 Classes
******************************************************************************/

/**
 * Error with an HTTP status, turned into a JSON response by the error handler
 * in server.ts.
 */
export class RouteError extends Error {
  public status: HttpStatusCodes;

  public constructor(status: HttpStatusCodes, message: string) {
    super(message);
    this.name = 'RouteError';
    this.status = status;
  }
}
