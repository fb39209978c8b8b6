// src/utils/errors.ts

/**
 * Base class for failures the announcement service reports to its caller.
 * Controllers turn these into `{ error }` responses with `statusCode`.
 */
export abstract class AnnouncementServiceError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Caller is not a known teacher
export class UnauthorizedError extends AnnouncementServiceError {
  readonly statusCode = 401;

  constructor(message = "Unauthorized") {
    super(message);
  }
}

export class InvalidRequestError extends AnnouncementServiceError {
  readonly statusCode = 400;
}

// Identifier did not parse
export class InvalidArgumentError extends AnnouncementServiceError {
  readonly statusCode = 400;
}

export class NotFoundError extends AnnouncementServiceError {
  readonly statusCode = 404;

  constructor(message = "Announcement not found") {
    super(message);
  }
}
