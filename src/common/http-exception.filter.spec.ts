import { BadRequestException, Logger } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { InvalidContextError } from './errors';
import { AllExceptionsFilter } from './http-exception.filter';

describe('AllExceptionsFilter', () => {
  const filter = new AllExceptionsFilter();
  let response: { status: jest.Mock; json: jest.Mock };
  let host: ExecutionContextHost;

  beforeEach(() => {
    response = { status: jest.fn().mockReturnThis(), json: jest.fn() };
    host = new ExecutionContextHost([{}, response]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('passes HTTP exceptions through', () => {
    filter.catch(new BadRequestException('bad body'), host);
    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      message: 'bad body',
      error: 'Bad Request',
    });
  });

  it('answers 400 for resolver errors', () => {
    filter.catch(new InvalidContextError('reference out of window'), host);
    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'InvalidContextError',
      message: 'reference out of window',
    });
  });

  it('hides anything else behind a 500', () => {
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    filter.catch(new Error('boom'), host);
    expect(response.status).toHaveBeenCalledWith(500);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
