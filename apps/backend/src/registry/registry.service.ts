import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'node:crypto';

import { AllocatedWallet } from '../iota/iota.service';
import { RegistryLedger } from './ledger/registry-ledger';
import { RegistryNotification } from './ledger/notifications';
import {
  CredentialRecord,
  DidDocumentRecord,
  InsurancePolicyRecord,
  InteractionRecord,
  MaintenanceRecord,
  PrincipalRecord,
  RecordInteractionInput,
  RegisterPrincipalInput,
  RegisterRoadsideUnitInput,
  RegisterVehicleInput,
  Role,
  RoadsideUnitRecord,
  StoreCredentialInput,
  VehicleRecord,
} from './registry.types';
import { SnapshotStore } from './snapshot.store';

export interface OnboardedPrincipal {
  principal: PrincipalRecord;
  publicKey: string;
  entityDocument: DidDocumentRecord;
  walletDocument: DidDocumentRecord;
}

/**
 * Hosts the registry ledger inside the application: forwards committed
 * notifications to the event bus and persists a snapshot after each commit.
 */
@Injectable()
export class RegistryService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(RegistryService.name);
  private ledger: RegistryLedger;

  constructor(
    @Inject(EventEmitter2) private readonly events: EventEmitter2,
    @Inject(SnapshotStore) private readonly snapshots: SnapshotStore,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {
    this.ledger = this.attach(new RegistryLedger());
  }

  async onModuleInit() {
    const snapshot = await this.snapshots.load();
    if (snapshot) {
      this.ledger = this.attach(RegistryLedger.fromSnapshot(snapshot));
    }
  }

  onApplicationShutdown() {
    return this.snapshots.flush();
  }

  get sequence(): number {
    return this.ledger.sequence;
  }

  // --- principals ---

  registerPrincipal(caller: string, input: RegisterPrincipalInput): Promise<PrincipalRecord> {
    return this.commit((ledger) => ledger.registerPrincipal(caller, input));
  }

  /**
   * Registers a freshly allocated wallet as a principal with newly minted
   * entity and wallet DIDs, then publishes a DID document for each. The three
   * writes share one snapshot save.
   */
  onboard(wallet: AllocatedWallet, input: { name: string; role: Role }): Promise<OnboardedPrincipal> {
    const method = this.config.get<string>('DID_METHOD', 'ssi');
    const entityDID = `did:${method}:entity:${randomUUID()}`;
    const walletDID = `did:${method}:wallet:${randomUUID()}`;

    return this.commit((ledger) => ({
      principal: ledger.registerPrincipal(wallet.address, { ...input, entityDID, walletDID }),
      publicKey: wallet.publicKey,
      entityDocument: ledger.storeDIDDocument(
        wallet.address,
        entityDID,
        this.buildDidDocument(entityDID, wallet, [input.role], walletDID),
      ),
      walletDocument: ledger.storeDIDDocument(
        wallet.address,
        walletDID,
        this.buildDidDocument(walletDID, wallet, ['Wallet'], entityDID),
      ),
    }));
  }

  registerRoadsideUnit(caller: string, input: RegisterRoadsideUnitInput): Promise<RoadsideUnitRecord> {
    return this.commit((ledger) => ledger.registerRoadsideUnit(caller, input));
  }

  deactivateRoadsideUnit(caller: string): Promise<RoadsideUnitRecord> {
    return this.commit((ledger) => ledger.deactivateRoadsideUnit(caller));
  }

  listPrincipals(role?: Role): PrincipalRecord[] {
    return this.ledger.listPrincipals(role);
  }

  listRoadsideUnits(): RoadsideUnitRecord[] {
    return this.ledger.listRoadsideUnits();
  }

  resolveDid(did: string) {
    return {
      did,
      registered: this.ledger.isRegistered(did),
      valid: this.ledger.isValidDID(did),
      address: this.ledger.resolveAddress(did),
    };
  }

  // --- vehicles ---

  registerVehicle(caller: string, input: RegisterVehicleInput): Promise<VehicleRecord> {
    return this.commit((ledger) => ledger.registerVehicle(caller, input));
  }

  transferOwnership(caller: string, vin: string, newOwner: string): Promise<VehicleRecord> {
    return this.commit((ledger) => ledger.transferOwnership(caller, vin, newOwner));
  }

  updateVehicleConfig(caller: string, vehicleWalletDID: string, config: string): Promise<VehicleRecord> {
    return this.commit((ledger) => ledger.updateVehicleConfig(caller, vehicleWalletDID, config));
  }

  getVehicle(vin: string): VehicleRecord {
    return this.ledger.getVehicle(vin);
  }

  getVehiclesByOwnerDID(ownerDID: string): VehicleRecord[] {
    return this.ledger.getVehiclesByOwnerDID(ownerDID);
  }

  // --- maintenance & insurance ---

  authorizeMechanic(caller: string, vin: string, mechanic: string): Promise<string[]> {
    return this.commit((ledger) => ledger.authorizeMechanic(caller, vin, mechanic));
  }

  addMaintenanceRecord(caller: string, vin: string, description: string, critical: boolean): Promise<MaintenanceRecord> {
    return this.commit((ledger) => ledger.addMaintenanceRecord(caller, vin, description, critical));
  }

  getMaintenanceHistory(vin: string, mechanic: string): MaintenanceRecord[] {
    return this.ledger.getMaintenanceHistory(vin, mechanic);
  }

  createInsurancePolicy(caller: string, vin: string, startDate: number, endDate: number): Promise<InsurancePolicyRecord> {
    return this.commit((ledger) => ledger.createInsurancePolicy(caller, vin, startDate, endDate));
  }

  getInsurancePolicy(vin: string) {
    return {
      current: this.ledger.getInsurancePolicy(vin),
      history: this.ledger.getPolicyHistory(vin),
    };
  }

  // --- DID documents & credentials ---

  storeDIDDocument(caller: string, did: string, document: string): Promise<DidDocumentRecord> {
    return this.commit((ledger) => ledger.storeDIDDocument(caller, did, document));
  }

  revokeDIDDocument(caller: string, did: string): Promise<DidDocumentRecord> {
    return this.commit((ledger) => ledger.revokeDIDDocument(caller, did));
  }

  getDIDDocument(did: string): DidDocumentRecord {
    return this.ledger.getDIDDocument(did);
  }

  storeCredential(caller: string, input: StoreCredentialInput): Promise<CredentialRecord> {
    return this.commit((ledger) => ledger.storeCredential(caller, input));
  }

  getCredential(credentialId: string): CredentialRecord {
    return this.ledger.getCredential(credentialId);
  }

  // --- interactions ---

  recordInteraction(input: RecordInteractionInput): Promise<InteractionRecord> {
    return this.commit((ledger) => ledger.recordInteraction(input));
  }

  queryByIdentifier(identifier: string): InteractionRecord[] {
    return this.ledger.queryByIdentifier(identifier);
  }

  queryBetween(id1: string, id2: string): InteractionRecord[] {
    return this.ledger.queryBetween(id1, id2);
  }

  private async commit<T>(operation: (ledger: RegistryLedger) => T): Promise<T> {
    const result = operation(this.ledger);
    await this.snapshots.save(this.ledger.exportSnapshot());
    return result;
  }

  private attach(ledger: RegistryLedger): RegistryLedger {
    ledger.subscribe((notification: RegistryNotification) => {
      this.logger.log(`#${notification.sequence} ${notification.type}`);
      this.events.emit(notification.type, notification);
    });

    return ledger;
  }

  private buildDidDocument(did: string, wallet: AllocatedWallet, types: string[], linkedDid: string): string {
    const keyId = `${did}#keys-1`;

    return JSON.stringify({
      '@context': ['https://www.w3.org/ns/did/v1'],
      id: did,
      type: types,
      controller: wallet.address,
      verificationMethod: [
        {
          id: keyId,
          type: 'Ed25519VerificationKey2020',
          controller: did,
          publicKeyBase64: wallet.publicKey,
        },
      ],
      authentication: [keyId],
      assertionMethod: [keyId],
      service: [{ id: `${linkedDid}#linked`, type: 'LinkedDid', serviceEndpoint: linkedDid }],
    });
  }
}
