import { Inject, Injectable, InternalServerErrorException, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Ed25519Keypair } from '@iota/iota-sdk/keypairs/ed25519';
import { isValidIotaAddress, normalizeIotaAddress } from '@iota/iota-sdk/utils';

export interface AllocatedWallet {
  address: string;
  publicKey: string;
}

/**
 * Custodial keyring. The registry acts on behalf of the addresses whose
 * keypairs it holds: the operator key, the signers configured in the
 * environment, and the wallets it allocates at runtime.
 */
@Injectable()
export class IotaKeyringService {
  private readonly logger = new Logger(IotaKeyringService.name);
  private readonly keypairs = new Map<string, Ed25519Keypair>();
  private readonly adminAddress: string | null;

  constructor(@Inject(ConfigService) private readonly config: ConfigService) {
    const adminPrivateKey = this.config.get<string>('IOTA_ADMIN_PRIVATE_KEY', '');
    this.adminAddress = adminPrivateKey ? this.hold(this.parseKeypair(adminPrivateKey)) : null;
    this.loadSignersFromEnv();
  }

  getConfigSnapshot() {
    return {
      mode: 'custodial',
      adminAddress: this.adminAddress,
      signerAddresses: [...this.keypairs.keys()],
    };
  }

  allocateWallet(): AllocatedWallet {
    const keypair = Ed25519Keypair.generate();
    const address = this.hold(keypair);
    this.logger.log(`Allocated wallet ${address}`);

    return {
      address,
      publicKey: keypair.getPublicKey().toBase64(),
    };
  }

  /** Defaults to the operator address when no caller is named. */
  resolveCaller(rawAddress?: string): string {
    const candidate = rawAddress?.trim() || this.adminAddress;
    if (!candidate) {
      throw new UnauthorizedException('Missing x-caller-address header and no operator key configured.');
    }

    const address = normalizeIotaAddress(candidate);
    if (!isValidIotaAddress(address)) {
      throw new UnauthorizedException(`Invalid caller address ${candidate}.`);
    }
    if (!this.keypairs.has(address)) {
      throw new UnauthorizedException(`No signer held for ${address}.`);
    }

    return address;
  }

  private hold(keypair: Ed25519Keypair): string {
    const address = normalizeIotaAddress(keypair.toIotaAddress());
    this.keypairs.set(address, keypair);
    return address;
  }

  private loadSignersFromEnv() {
    const raw = this.config.get<string>('IOTA_SIGNER_PRIVATE_KEYS_JSON', '').trim();
    if (!raw) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new InternalServerErrorException(
        'IOTA_SIGNER_PRIVATE_KEYS_JSON is not valid JSON. Use {"0xaddress":"iotaprivkey..."}',
      );
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new InternalServerErrorException('IOTA_SIGNER_PRIVATE_KEYS_JSON must be an object of address to key.');
    }

    for (const [declared, secret] of Object.entries(parsed)) {
      if (typeof secret !== 'string') {
        throw new InternalServerErrorException(`Signer key for ${declared} must be a string.`);
      }

      const address = this.hold(this.parseKeypair(secret));
      if (address !== normalizeIotaAddress(declared)) {
        throw new InternalServerErrorException(`Signer key for ${declared} derives ${address}.`);
      }
    }
  }

  private parseKeypair(secret: string): Ed25519Keypair {
    const value = secret.trim();
    if (!value) {
      throw new InternalServerErrorException('Signer private key is empty.');
    }

    if (value.includes(' ')) {
      return Ed25519Keypair.deriveKeypair(value);
    }

    try {
      return Ed25519Keypair.fromSecretKey(value);
    } catch {
      const normalizedHex = value.startsWith('0x') ? value.slice(2) : value;
      if (!/^[0-9a-fA-F]+$/.test(normalizedHex) || normalizedHex.length !== 64) {
        throw new InternalServerErrorException('Unsupported private key format.');
      }

      return Ed25519Keypair.fromSecretKey(Buffer.from(normalizedHex, 'hex'));
    }
  }
}
