import { Address, PrincipalRecord, Role, VehicleRecord, Vin } from '../registry.types';
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  RegistryErrorCode,
  ValidationError,
} from './errors';
import { RegistryState } from './registry-state';

// --- Predicates ---

export const isRegisteredPrincipal = (state: RegistryState, address: Address): boolean =>
  state.principals.get(address)?.registered === true;

export const hasRole = (state: RegistryState, address: Address, role: Role): boolean =>
  isRegisteredPrincipal(state, address) && state.principals.get(address)?.role === role;

export const isVehicleOwner = (state: RegistryState, address: Address, vin: Vin): boolean =>
  state.vehicles.get(vin)?.currentOwner === address;

export const isMechanicAuthorized = (state: RegistryState, vin: Vin, address: Address): boolean =>
  state.mechanicAuthorizations.get(vin)?.has(address) === true;

export const isActiveRoadsideUnit = (state: RegistryState, address: Address): boolean =>
  state.roadsideUnits.get(address)?.active === true;

// --- Guards ---
// Each guard reads state only and throws on the first violation.

export function requireRegistered(state: RegistryState, address: Address): PrincipalRecord {
  const principal = state.principals.get(address);
  if (!principal?.registered) {
    throw new AuthorizationError(RegistryErrorCode.NOT_REGISTERED, 'Caller is not a registered principal.', {
      address,
    });
  }

  return principal;
}

export function requireUnregistered(state: RegistryState, address: Address): void {
  if (isRegisteredPrincipal(state, address)) {
    throw new ConflictError(RegistryErrorCode.ALREADY_REGISTERED, 'Address already registered.', { address });
  }
}

/**
 * Fails when `address` is not a registered principal holding `role`. Whether
 * that is an authorization or a validation failure depends on whose role is
 * checked: the caller's own, or the target of the action.
 */
export function requireRole(
  state: RegistryState,
  address: Address,
  role: Role,
  failAs: 'authorization' | 'validation' = 'authorization',
): void {
  if (failAs === 'authorization') {
    requireRegistered(state, address);
  }
  if (hasRole(state, address, role)) {
    return;
  }

  const message = `Address must be a registered ${role}.`;
  const details = { address, role, actual: state.principals.get(address)?.role ?? null };
  throw failAs === 'validation'
    ? new ValidationError(RegistryErrorCode.ROLE_REQUIRED, message, details)
    : new AuthorizationError(RegistryErrorCode.ROLE_REQUIRED, message, details);
}

export function requireVehicle(state: RegistryState, vin: Vin): VehicleRecord {
  const vehicle = state.vehicles.get(vin);
  if (!vehicle) {
    throw new NotFoundError(RegistryErrorCode.VEHICLE_NOT_FOUND, `Vehicle ${vin} not found.`, { vin });
  }

  return vehicle;
}

export function requireVehicleOwner(state: RegistryState, address: Address, vin: Vin): VehicleRecord {
  const vehicle = requireVehicle(state, vin);
  if (!isVehicleOwner(state, address, vin)) {
    throw new AuthorizationError(RegistryErrorCode.NOT_VEHICLE_OWNER, 'Caller does not own this vehicle.', {
      vin,
      address,
    });
  }

  return vehicle;
}

export function requireMechanicAuthorized(state: RegistryState, vin: Vin, address: Address): void {
  if (!isMechanicAuthorized(state, vin, address)) {
    throw new AuthorizationError(
      RegistryErrorCode.MECHANIC_NOT_AUTHORIZED,
      'Mechanic is not authorized for this vehicle.',
      { vin, address },
    );
  }
}

export function requireUnboundDid(state: RegistryState, did: string): void {
  if (state.registeredDids.has(did)) {
    throw new ConflictError(RegistryErrorCode.DID_ALREADY_BOUND, `DID ${did} is already registered.`, { did });
  }
}

export function requireDistinctDids(entityDID: string, walletDID: string): void {
  if (entityDID === walletDID) {
    throw new ValidationError(
      RegistryErrorCode.DUPLICATE_DID_PAIR,
      'entityDID and walletDID must be different.',
      { did: entityDID },
    );
  }
}
