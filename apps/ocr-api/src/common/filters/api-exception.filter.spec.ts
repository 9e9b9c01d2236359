import {
  BadRequestException,
  HttpException,
  HttpStatus,
  PayloadTooLargeException,
  UnauthorizedException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ApiExceptionFilter } from './api-exception.filter';

function createHost() {
  const res = {
    setHeader: jest.fn(),
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);

  const host = new ExecutionContextHost([{}, res]);

  return { host, res };
}

describe('ApiExceptionFilter', () => {
  const filter = new ApiExceptionFilter();

  it('keeps the reason carried by the exception', () => {
    const { host, res } = createHost();

    filter.catch(
      new HttpException(
        {
          statusCode: 400,
          error: 'Bad Request',
          reason: 'INVALID_STATE',
          message: 'Job is not completed yet (status: failed)',
        },
        HttpStatus.BAD_REQUEST,
      ),
      host,
    );

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'Bad Request',
      reason: 'INVALID_STATE',
      message: 'Job is not completed yet (status: failed)',
    });
    expect(res.setHeader).not.toHaveBeenCalled();
  });

  it('derives a reason for exceptions raised by the framework', () => {
    const { host, res } = createHost();

    filter.catch(new PayloadTooLargeException('File too large'), host);

    expect(res.json).toHaveBeenCalledWith({
      statusCode: 413,
      error: 'Payload Too Large',
      reason: 'PAYLOAD_TOO_LARGE',
      message: 'File too large',
    });
  });

  it('keeps validation message lists', () => {
    const { host, res } = createHost();

    filter.catch(new BadRequestException(['username should not be empty']), host);

    expect(res.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'Bad Request',
      reason: 'VALIDATION_ERROR',
      message: ['username should not be empty'],
    });
  });

  it('adds the Bearer challenge to every 401', () => {
    const { host, res } = createHost();

    filter.catch(new UnauthorizedException('Authentication token is missing'), host);

    expect(res.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Bearer');
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 401,
      error: 'Unauthorized',
      reason: 'AUTHENTICATION_ERROR',
      message: 'Authentication token is missing',
    });
  });

  it('ignores reasons outside the known set', () => {
    const { host, res } = createHost();

    filter.catch(new HttpException({ reason: 'SOMETHING_ELSE' }, HttpStatus.CONFLICT), host);

    expect(res.json).toHaveBeenCalledWith({
      statusCode: 409,
      error: 'Conflict',
      reason: 'HTTP_ERROR',
      message: 'Http Exception',
    });
  });
});
