import { isValidIotaAddress, normalizeIotaAddress } from '@iota/iota-sdk/utils';

import { Address, Did, ROLES, Role, Vin } from '../registry.types';
import { RegistryErrorCode, ValidationError } from './errors';

export const ZERO_ADDRESS: Address = normalizeIotaAddress('0x0');

export function requireText(value: string, field: string): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    throw new ValidationError(RegistryErrorCode.EMPTY_FIELD, `${field} must not be empty.`, { field });
  }

  return trimmed;
}

/**
 * Canonical 32-byte hex address. Short forms are left-padded, case is folded,
 * and the zero address is rejected because it stands for "nobody".
 */
export function toAddress(value: string, field = 'address'): Address {
  const raw = requireText(value, field);
  const normalized = normalizeIotaAddress(raw);

  if (!isValidIotaAddress(normalized) || normalized === ZERO_ADDRESS) {
    throw new ValidationError(RegistryErrorCode.INVALID_ADDRESS, `${field} is not a valid address.`, {
      field,
      value: raw,
    });
  }

  return normalized;
}

export function toDid(value: string, field = 'did'): Did {
  return requireText(value, field);
}

export function toVin(value: string, field = 'vin'): Vin {
  return requireText(value, field).toUpperCase();
}

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}

export function toRole(value: string): Role {
  if (!isRole(value)) {
    throw new ValidationError(RegistryErrorCode.INVALID_ROLE, `Unknown role "${value}".`, {
      allowed: [...ROLES],
    });
  }

  return value;
}
