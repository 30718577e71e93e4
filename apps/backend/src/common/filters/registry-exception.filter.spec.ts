import { BadRequestException, HttpStatus, Logger, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';

import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  RegistryError,
  RegistryErrorCode,
  ValidationError,
} from '../../registry/ledger/errors';
import { RegistryExceptionFilter } from './registry-exception.filter';

describe('RegistryExceptionFilter', () => {
  const filter = new RegistryExceptionFilter();
  let response: { status: jest.Mock; json: jest.Mock };
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  const handle = (exception: unknown) => {
    filter.catch(exception, new ExecutionContextHost([{ url: '/api/vehicles/VIN001', method: 'POST' }, response]));
    return response.json.mock.calls[0][0];
  };

  beforeEach(() => {
    response = { status: jest.fn().mockReturnThis(), json: jest.fn() };
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps registry errors to a status with their code and details', () => {
    const body = handle(
      new NotFoundError(RegistryErrorCode.VEHICLE_NOT_FOUND, 'Vehicle VIN001 is not registered.', { vin: 'VIN001' }),
    );

    expect(response.status).toHaveBeenCalledWith(HttpStatus.NOT_FOUND);
    expect(body).toMatchObject({
      statusCode: 404,
      error: 'NotFoundError',
      code: 'VEHICLE_NOT_FOUND',
      message: 'Vehicle VIN001 is not registered.',
      details: { vin: 'VIN001' },
      path: '/api/vehicles/VIN001',
      method: 'POST',
    });
    expect(warn).toHaveBeenCalledWith('POST /api/vehicles/VIN001 -> 404 VEHICLE_NOT_FOUND');
  });

  it.each<[RegistryError, number]>([
    [new ValidationError(RegistryErrorCode.INVALID_YEAR, 'bad year'), 400],
    [new AuthorizationError(RegistryErrorCode.NOT_VEHICLE_OWNER, 'not owner'), 403],
    [new ConflictError(RegistryErrorCode.VIN_ALREADY_REGISTERED, 'taken'), 409],
  ])('maps %s to %i', (exception, status) => {
    const body = handle(exception);

    expect(response.status).toHaveBeenCalledWith(status);
    expect(body.details).toBeNull();
  });

  it('passes framework exceptions through with their messages', () => {
    const body = handle(new BadRequestException(['year must not be less than 1950']));

    expect(response.status).toHaveBeenCalledWith(400);
    expect(body).toMatchObject({
      statusCode: 400,
      error: 'BadRequestException',
      code: null,
      message: ['year must not be less than 1950'],
    });
  });

  it('keeps string messages of framework exceptions', () => {
    const body = handle(new UnauthorizedException('No signer held for 0x1.'));

    expect(response.status).toHaveBeenCalledWith(401);
    expect(body.message).toBe('No signer held for 0x1.');
  });

  it('hides unexpected errors behind a 500', () => {
    const body = handle(new TypeError('boom'));

    expect(response.status).toHaveBeenCalledWith(500);
    expect(body).toMatchObject({ statusCode: 500, message: 'Internal server error', code: null });
    expect(error).toHaveBeenCalledTimes(1);
    expect(warn).not.toHaveBeenCalled();
  });
});
