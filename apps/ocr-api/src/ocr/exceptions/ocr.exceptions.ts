import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorReason } from '../../common/errors/error-reason';

/**
 * Thrown when no file is attached to the upload request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        reason: ErrorReason.VALIDATION_ERROR,
        message: 'A file must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded filename does not end in an allowed extension.
 * Maps to HTTP 400 Bad Request.
 */
export class UnsupportedFileTypeException extends HttpException {
  constructor(filename: string, allowedExtensions: readonly string[]) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        reason: ErrorReason.VALIDATION_ERROR,
        message: `File "${filename}" is not supported. Allowed extensions: ${allowedExtensions.join(', ')}`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded file exceeds the configured size limit.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        reason: ErrorReason.PAYLOAD_TOO_LARGE,
        message: `File exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown when the upload could not be written to the work directory.
 * Wraps the filesystem error without leaking paths.
 * Maps to HTTP 500 Internal Server Error.
 */
export class UploadPersistenceException extends HttpException {
  constructor(cause: unknown) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        reason: ErrorReason.INTERNAL_ERROR,
        message: 'Failed to store the uploaded file. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}

/**
 * Thrown when no job with the requested id exists.
 * Maps to HTTP 404 Not Found.
 */
export class JobNotFoundException extends HttpException {
  constructor(jobId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        reason: ErrorReason.NOT_FOUND,
        message: `Task ${jobId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when the caller asks for a job uploaded by someone else.
 * Maps to HTTP 403 Forbidden.
 */
export class JobAccessForbiddenException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.FORBIDDEN,
        error: 'Forbidden',
        reason: ErrorReason.FORBIDDEN,
        message: 'Not authorized to access this task',
      },
      HttpStatus.FORBIDDEN,
    );
  }
}

/**
 * Thrown when a result is requested before the job completed.
 * Maps to HTTP 400 Bad Request with reason INVALID_STATE.
 */
export class JobNotCompletedException extends HttpException {
  constructor(status: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        reason: ErrorReason.INVALID_STATE,
        message: `Task is not completed yet. Current status: ${status}`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when a completed job has no result text.
 * Maps to HTTP 404 Not Found.
 */
export class ResultMissingException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        reason: ErrorReason.NOT_FOUND,
        message: 'Result not found',
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
