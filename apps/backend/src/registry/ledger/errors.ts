/**
 * Registry error taxonomy. Codes are stable and safe to match on from
 * outside the process.
 */

export enum RegistryErrorCode {
  // Validation
  EMPTY_FIELD = 'EMPTY_FIELD',
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  INVALID_ROLE = 'INVALID_ROLE',
  INVALID_YEAR = 'INVALID_YEAR',
  INVALID_POLICY_PERIOD = 'INVALID_POLICY_PERIOD',
  INVALID_DID = 'INVALID_DID',
  DUPLICATE_DID_PAIR = 'DUPLICATE_DID_PAIR',
  NEW_OWNER_NOT_REGISTERED = 'NEW_OWNER_NOT_REGISTERED',
  VEHICLE_NOT_REGISTERED = 'VEHICLE_NOT_REGISTERED',
  VEHICLE_HAS_NO_OWNER = 'VEHICLE_HAS_NO_OWNER',
  UNKNOWN_SOURCE = 'UNKNOWN_SOURCE',
  UNKNOWN_DESTINATION = 'UNKNOWN_DESTINATION',
  ROADSIDE_UNIT_INACTIVE = 'ROADSIDE_UNIT_INACTIVE',
  DID_DOCUMENT_REVOKED = 'DID_DOCUMENT_REVOKED',
  INVALID_VEHICLE_CONFIG = 'INVALID_VEHICLE_CONFIG',

  // Authorization
  NOT_REGISTERED = 'NOT_REGISTERED',
  ROLE_REQUIRED = 'ROLE_REQUIRED',
  NOT_VEHICLE_OWNER = 'NOT_VEHICLE_OWNER',
  MECHANIC_NOT_AUTHORIZED = 'MECHANIC_NOT_AUTHORIZED',
  NOT_DID_CONTROLLER = 'NOT_DID_CONTROLLER',

  // Not found
  DID_NOT_FOUND = 'DID_NOT_FOUND',
  PRINCIPAL_NOT_FOUND = 'PRINCIPAL_NOT_FOUND',
  ROADSIDE_UNIT_NOT_FOUND = 'ROADSIDE_UNIT_NOT_FOUND',
  VEHICLE_NOT_FOUND = 'VEHICLE_NOT_FOUND',
  POLICY_NOT_FOUND = 'POLICY_NOT_FOUND',
  DID_DOCUMENT_NOT_FOUND = 'DID_DOCUMENT_NOT_FOUND',
  CREDENTIAL_NOT_FOUND = 'CREDENTIAL_NOT_FOUND',

  // Conflict
  ALREADY_REGISTERED = 'ALREADY_REGISTERED',
  VIN_ALREADY_REGISTERED = 'VIN_ALREADY_REGISTERED',
  DID_ALREADY_BOUND = 'DID_ALREADY_BOUND',
  CREDENTIAL_EXISTS = 'CREDENTIAL_EXISTS',
}

export type RegistryErrorKind = 'validation' | 'authorization' | 'not-found' | 'conflict';

export abstract class RegistryError extends Error {
  abstract readonly kind: RegistryErrorKind;

  constructor(
    public readonly code: RegistryErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends RegistryError {
  readonly kind = 'validation';
}

export class AuthorizationError extends RegistryError {
  readonly kind = 'authorization';
}

export class NotFoundError extends RegistryError {
  readonly kind = 'not-found';
}

export class ConflictError extends RegistryError {
  readonly kind = 'conflict';
}
