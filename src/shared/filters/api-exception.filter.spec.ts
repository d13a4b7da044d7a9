import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ApiExceptionFilter, toErrorBody } from './api-exception.filter';

describe('toErrorBody', () => {
  it('keeps the message of a not-found error', () => {
    expect(toErrorBody(new NotFoundException('Shift not found with id: 42'), '/api/v1/shifts/42')).toEqual({
      status: 404,
      error: 'Not Found',
      message: 'Shift not found with id: 42',
      path: '/api/v1/shifts/42',
      timestamp: expect.any(String),
    });
  });

  it('joins validation messages', () => {
    const exception = new BadRequestException(['doctorId must be a mongodb id', 'room should not be empty']);

    expect(toErrorBody(exception, '/api/v1/shifts').message).toBe(
      'doctorId must be a mongodb id; room should not be empty',
    );
  });

  it('keeps the reason phrase of a conflict', () => {
    const body = toErrorBody(new ConflictException('taken'), '/api/v1/doctors');

    expect(body.status).toBe(409);
    expect(body.error).toBe('Conflict');
  });

  it('passes lock timeouts through', () => {
    const body = toErrorBody(new ServiceUnavailableException('busy, please retry'), '/api/v1/shifts');

    expect(body.status).toBe(503);
    expect(body.message).toBe('busy, please retry');
  });

  it('hides the details of server errors', () => {
    expect(toErrorBody(new InternalServerErrorException('pool exhausted'), '/x').message).toBe(
      'Internal server error',
    );
  });

  it('turns unknown errors into a 500', () => {
    const body = toErrorBody(new Error('connection reset'), '/api/v1/shifts');

    expect(body).toMatchObject({
      status: 500,
      error: 'Internal Server Error',
      message: 'Internal server error',
    });
  });
});

describe('ApiExceptionFilter', () => {
  it('writes the error body to the response', () => {
    const json = jest.fn();
    const status = jest.fn(() => ({ json }));
    const host = new ExecutionContextHost([
      { method: 'GET', originalUrl: '/api/v1/shifts/42', url: '/shifts/42' },
      { status },
    ]);
    const filter = new ApiExceptionFilter();

    filter.catch(new NotFoundException('Shift not found with id: 42'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ status: 404, message: 'Shift not found with id: 42', path: '/api/v1/shifts/42' }),
    );
  });
});
