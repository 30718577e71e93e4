import { InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Ed25519Keypair } from '@iota/iota-sdk/keypairs/ed25519';
import { normalizeIotaAddress } from '@iota/iota-sdk/utils';

import { IotaKeyringService } from './iota.service';

describe('IotaKeyringService', () => {
  const operator = Ed25519Keypair.generate();
  const signer = Ed25519Keypair.generate();
  const operatorAddress = normalizeIotaAddress(operator.toIotaAddress());
  const signerAddress = normalizeIotaAddress(signer.toIotaAddress());

  const keyring = (values: Record<string, string>) => new IotaKeyringService(new ConfigService(values));

  let service: IotaKeyringService;

  beforeEach(() => {
    service = keyring({
      IOTA_ADMIN_PRIVATE_KEY: operator.getSecretKey(),
      IOTA_SIGNER_PRIVATE_KEYS_JSON: JSON.stringify({ [signerAddress]: signer.getSecretKey() }),
    });
  });

  it('acts as the operator when no caller is named', () => {
    expect(service.resolveCaller()).toBe(operatorAddress);
    expect(service.resolveCaller('  ')).toBe(operatorAddress);
  });

  it('normalizes the caller address before looking up its signer', () => {
    expect(service.resolveCaller(`0x${signerAddress.slice(2).toUpperCase()}`)).toBe(signerAddress);
  });

  it('refuses callers it holds no keypair for', () => {
    expect(() => service.resolveCaller(`0x${'ff'.repeat(32)}`)).toThrow(UnauthorizedException);
    expect(() => service.resolveCaller('not-an-address')).toThrow(UnauthorizedException);
  });

  it('requires a caller when no operator key is configured', () => {
    expect(() => keyring({}).resolveCaller()).toThrow(UnauthorizedException);
  });

  it('holds the keypairs of allocated wallets', () => {
    const wallet = service.allocateWallet();

    expect(service.resolveCaller(wallet.address)).toBe(wallet.address);
    expect(Buffer.from(wallet.publicKey, 'base64')).toHaveLength(32);
    expect(service.getConfigSnapshot()).toEqual({
      mode: 'custodial',
      adminAddress: operatorAddress,
      signerAddresses: [operatorAddress, signerAddress, wallet.address],
    });
  });

  it('accepts hex encoded secret keys', () => {
    const hex = '11'.repeat(32);
    const expected = normalizeIotaAddress(Ed25519Keypair.fromSecretKey(Buffer.from(hex, 'hex')).toIotaAddress());

    expect(keyring({ IOTA_ADMIN_PRIVATE_KEY: `0x${hex}` }).resolveCaller()).toBe(expected);
  });

  it('rejects a signer whose key derives a different address', () => {
    expect(() =>
      keyring({ IOTA_SIGNER_PRIVATE_KEYS_JSON: JSON.stringify({ [operatorAddress]: signer.getSecretKey() }) }),
    ).toThrow(InternalServerErrorException);
  });

  it('rejects malformed signer configuration', () => {
    expect(() => keyring({ IOTA_SIGNER_PRIVATE_KEYS_JSON: '{nope' })).toThrow(InternalServerErrorException);
    expect(() => keyring({ IOTA_SIGNER_PRIVATE_KEYS_JSON: '["a"]' })).toThrow(InternalServerErrorException);
  });
});
