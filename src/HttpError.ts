// HttpError.ts

export enum HttpStatus {
  OK = 200,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  UNPROCESSABLE_ENTITY = 422,
  INTERNAL_SERVER_ERROR = 500,
}

export class HttpError extends Error {
  constructor(message: string, readonly status: HttpStatus) {
    super(message);
    this.name = "HttpError";
  }
}
