import { Logger } from '@nestjs/common';

import {
  Address,
  CredentialRecord,
  Did,
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
} from '../registry.types';
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  RegistryErrorCode,
  ValidationError,
} from './errors';
import {
  isActiveRoadsideUnit,
  isRegisteredPrincipal,
  requireDistinctDids,
  requireMechanicAuthorized,
  requireRole,
  requireUnboundDid,
  requireUnregistered,
  requireVehicle,
  requireVehicleOwner,
} from './guards';
import { requireText, toAddress, toDid, toRole, toVin } from './identifiers';
import { NotificationBody, NotificationListener, RegistryNotification } from './notifications';
import { RegistrySnapshot, RegistryState } from './registry-state';

export interface RegistryLedgerOptions {
  /** Milliseconds since the epoch. */
  clock?: () => number;
  state?: RegistryState;
}

type Emit = (body: NotificationBody) => void;

const clone = <T>(value: T): T => structuredClone(value);

const isJsonObject = (text: string): boolean => {
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
  } catch {
    return false;
  }
};

/**
 * The registry state machine. Every operation is synchronous: guards run
 * against the current state first, writes follow only once every guard has
 * passed, and notifications are delivered after the write. A failing
 * operation leaves state and listeners untouched.
 */
export class RegistryLedger {
  private readonly state: RegistryState;
  private readonly clock: () => number;
  private readonly listeners = new Set<NotificationListener>();
  private readonly logger = new Logger(RegistryLedger.name);

  constructor(options: RegistryLedgerOptions = {}) {
    this.state = options.state ?? new RegistryState();
    this.clock = options.clock ?? Date.now;
  }

  static fromSnapshot(snapshot: RegistrySnapshot, options: Omit<RegistryLedgerOptions, 'state'> = {}) {
    return new RegistryLedger({ ...options, state: RegistryState.fromSnapshot(snapshot) });
  }

  get sequence(): number {
    return this.state.sequence;
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  exportSnapshot(): RegistrySnapshot {
    return this.state.toSnapshot();
  }

  // --- Principal registry ---

  registerPrincipal(caller: string, input: RegisterPrincipalInput): PrincipalRecord {
    const address = toAddress(caller, 'caller');
    const name = requireText(input.name, 'name');
    const role = toRole(input.role);
    const entityDID = toDid(input.entityDID, 'entityDID');
    const walletDID = toDid(input.walletDID, 'walletDID');

    requireDistinctDids(entityDID, walletDID);
    requireUnregistered(this.state, address);
    requireUnboundDid(this.state, entityDID);
    requireUnboundDid(this.state, walletDID);

    return this.commit((emit, timestamp) => {
      const principal: PrincipalRecord = {
        address,
        name,
        role,
        entityDID,
        walletDID,
        registered: true,
        registeredAt: timestamp,
      };

      this.state.principals.set(address, principal);
      this.bindDid(entityDID, address);
      this.bindDid(walletDID, address);
      emit({ type: 'principal.registered', address, name, role, entityDID, walletDID });

      return clone(principal);
    });
  }

  registerRoadsideUnit(caller: string, input: RegisterRoadsideUnitInput): RoadsideUnitRecord {
    const address = toAddress(caller, 'caller');
    const name = requireText(input.name, 'name');
    const location = requireText(input.location, 'location');
    const entityDID = toDid(input.entityDID, 'entityDID');
    const walletDID = toDid(input.walletDID, 'walletDID');

    requireDistinctDids(entityDID, walletDID);
    if (this.state.roadsideUnits.has(address)) {
      throw new ConflictError(RegistryErrorCode.ALREADY_REGISTERED, 'Roadside unit already registered.', {
        address,
      });
    }
    requireUnboundDid(this.state, entityDID);
    requireUnboundDid(this.state, walletDID);

    return this.commit((emit, timestamp) => {
      const unit: RoadsideUnitRecord = {
        address,
        name,
        location,
        entityDID,
        walletDID,
        active: true,
        registeredAt: timestamp,
      };

      this.state.roadsideUnits.set(address, unit);
      this.bindDid(entityDID, address);
      this.bindDid(walletDID, address);
      emit({ type: 'roadside-unit.registered', address, name, location, entityDID, walletDID });

      return clone(unit);
    });
  }

  deactivateRoadsideUnit(caller: string): RoadsideUnitRecord {
    const address = toAddress(caller, 'caller');
    const unit = this.state.roadsideUnits.get(address);
    if (!unit) {
      throw new NotFoundError(RegistryErrorCode.ROADSIDE_UNIT_NOT_FOUND, 'Roadside unit not found.', { address });
    }
    if (!unit.active) {
      throw new ValidationError(RegistryErrorCode.ROADSIDE_UNIT_INACTIVE, 'Roadside unit already inactive.', {
        address,
      });
    }

    return this.commit((emit) => {
      unit.active = false;
      emit({ type: 'roadside-unit.deactivated', address });
      return clone(unit);
    });
  }

  isRegistered(did: string): boolean {
    return this.state.registeredDids.has(did.trim());
  }

  /** Registered and, when a document exists, not revoked. */
  isValidDID(did: string): boolean {
    const key = did.trim();
    if (!this.state.registeredDids.has(key)) {
      return false;
    }

    return this.state.didDocuments.get(key)?.active !== false;
  }

  /** Vehicle DIDs resolve to the vehicle's current owner. */
  resolveAddress(did: string): Address {
    const key = toDid(did);
    const bound = this.state.didToAddress.get(key);
    if (bound) {
      return bound;
    }

    const vin = this.state.vehicleDids.get(key);
    const vehicle = vin ? this.state.vehicles.get(vin) : undefined;
    if (vehicle) {
      return vehicle.currentOwner;
    }

    throw new NotFoundError(RegistryErrorCode.DID_NOT_FOUND, `DID ${key} is not bound to an address.`, { did: key });
  }

  getPrincipal(address: string): PrincipalRecord {
    const key = toAddress(address);
    const principal = this.state.principals.get(key);
    if (!principal) {
      throw new NotFoundError(RegistryErrorCode.PRINCIPAL_NOT_FOUND, 'Principal not found.', { address: key });
    }

    return clone(principal);
  }

  getRoadsideUnit(address: string): RoadsideUnitRecord {
    const key = toAddress(address);
    const unit = this.state.roadsideUnits.get(key);
    if (!unit) {
      throw new NotFoundError(RegistryErrorCode.ROADSIDE_UNIT_NOT_FOUND, 'Roadside unit not found.', {
        address: key,
      });
    }

    return clone(unit);
  }

  getRegisteredAddresses(): Address[] {
    return [...this.state.principals.keys()];
  }

  listPrincipals(role?: Role): PrincipalRecord[] {
    const principals = [...this.state.principals.values()];
    return clone(role ? principals.filter((principal) => principal.role === role) : principals);
  }

  listRoadsideUnits(): RoadsideUnitRecord[] {
    return clone([...this.state.roadsideUnits.values()]);
  }

  // --- Vehicle registry ---

  registerVehicle(caller: string, input: RegisterVehicleInput): VehicleRecord {
    const registeredBy = toAddress(caller, 'caller');
    const vin = toVin(input.vin);
    const ownerDID = toDid(input.ownerDID, 'ownerDID');
    const entityDID = toDid(input.entityDID, 'entityDID');
    const walletDID = toDid(input.walletDID, 'walletDID');
    const make = requireText(input.make, 'make');
    const model = requireText(input.model, 'model');
    const credentialDID = input.credentialDID?.trim() || null;

    if (!Number.isInteger(input.year) || input.year <= 0) {
      throw new ValidationError(RegistryErrorCode.INVALID_YEAR, 'year must be a positive integer.', {
        year: input.year,
      });
    }

    const owner = this.state.didToAddress.get(ownerDID);
    if (!owner || !this.ownsDid(owner, ownerDID)) {
      throw new NotFoundError(RegistryErrorCode.DID_NOT_FOUND, `Owner DID ${ownerDID} does not resolve to a principal.`, {
        did: ownerDID,
      });
    }
    if (this.state.vehicles.has(vin)) {
      throw new ConflictError(RegistryErrorCode.VIN_ALREADY_REGISTERED, `Vehicle ${vin} already registered.`, {
        vin,
      });
    }
    requireDistinctDids(entityDID, walletDID);
    requireUnboundDid(this.state, entityDID);
    requireUnboundDid(this.state, walletDID);

    return this.commit((emit, timestamp) => {
      const vehicle: VehicleRecord = {
        vin,
        make,
        model,
        year: input.year,
        currentOwner: owner,
        previousOwners: [],
        entityDID,
        walletDID,
        credentialDID,
        registered: true,
        currentInsurer: null,
        maintenanceProviders: [],
        config: null,
        configUpdatedAt: null,
        registeredAt: timestamp,
      };

      this.state.addVehicle(vehicle);
      this.state.registeredDids.add(entityDID);
      this.state.registeredDids.add(walletDID);
      emit({ type: 'vehicle.registered', vin, owner, entityDID, walletDID, registeredBy });
      emit({ type: 'did.registered', did: entityDID, address: null, vin });
      emit({ type: 'did.registered', did: walletDID, address: null, vin });

      return clone(vehicle);
    });
  }

  /**
   * Appends the incoming owner, not the outgoing one, to `previousOwners`.
   * Consumers rely on this ordering.
   */
  transferOwnership(caller: string, vin: string, newOwner: string): VehicleRecord {
    const address = toAddress(caller, 'caller');
    const key = toVin(vin);
    const recipient = toAddress(newOwner, 'newOwner');

    const vehicle = requireVehicleOwner(this.state, address, key);
    if (!isRegisteredPrincipal(this.state, recipient)) {
      throw new ValidationError(RegistryErrorCode.NEW_OWNER_NOT_REGISTERED, 'New owner is not registered.', {
        newOwner: recipient,
      });
    }

    return this.commit((emit) => {
      const previousOwner = vehicle.currentOwner;
      vehicle.currentOwner = recipient;
      vehicle.previousOwners.push(recipient);
      this.state.moveVehicle(key, previousOwner, recipient);
      emit({ type: 'vehicle.ownership-transferred', vin: key, previousOwner, newOwner: recipient });

      const policy = this.state.policies.get(key);
      if (policy?.active) {
        policy.active = false;
        emit({ type: 'insurance.policy-deactivated', vin: key, insurer: policy.insurer, reason: 'ownership-transfer' });
      }

      return clone(vehicle);
    });
  }

  /** Addressed by the vehicle's wallet DID; only the current owner may write it. */
  updateVehicleConfig(caller: string, vehicleWalletDID: string, config: string): VehicleRecord {
    const address = toAddress(caller, 'caller');
    const did = toDid(vehicleWalletDID, 'vehicleWalletDID');
    const settings = requireText(config, 'config');

    const vin = this.state.vehicleDids.get(did);
    const target = vin ? this.state.vehicles.get(vin) : undefined;
    if (!vin || target?.walletDID !== did) {
      throw new NotFoundError(RegistryErrorCode.VEHICLE_NOT_FOUND, `No vehicle has wallet DID ${did}.`, { did });
    }
    const vehicle = requireVehicleOwner(this.state, address, vin);
    if (!isJsonObject(settings)) {
      throw new ValidationError(RegistryErrorCode.INVALID_VEHICLE_CONFIG, 'config must be a JSON object.', { vin });
    }

    return this.commit((emit, timestamp) => {
      vehicle.config = settings;
      vehicle.configUpdatedAt = timestamp;
      emit({ type: 'vehicle.config-updated', vin, walletDID: did, updatedBy: address });

      return clone(vehicle);
    });
  }

  getVehiclesByOwnerDID(ownerDID: string): VehicleRecord[] {
    const owner = this.state.didToAddress.get(ownerDID.trim());
    if (!owner) {
      return [];
    }

    return this.state.vinsOwnedBy(owner).flatMap((vin) => {
      const vehicle = this.state.vehicles.get(vin);
      return vehicle ? [clone(vehicle)] : [];
    });
  }

  getVehicle(vin: string): VehicleRecord {
    return clone(requireVehicle(this.state, toVin(vin)));
  }

  getVehicleByDID(did: string): VehicleRecord {
    const key = toDid(did);
    const vin = this.state.vehicleDids.get(key);
    if (!vin) {
      throw new NotFoundError(RegistryErrorCode.VEHICLE_NOT_FOUND, `No vehicle carries DID ${key}.`, { did: key });
    }

    return this.getVehicle(vin);
  }

  // --- Maintenance & insurance ---

  authorizeMechanic(caller: string, vin: string, mechanic: string): Address[] {
    const address = toAddress(caller, 'caller');
    const key = toVin(vin);
    const mechanicAddress = toAddress(mechanic, 'mechanic');

    requireVehicleOwner(this.state, address, key);
    requireRole(this.state, mechanicAddress, 'Mechanic', 'validation');

    return this.commit((emit) => {
      const authorized = this.state.mechanicAuthorizations.get(key) ?? new Set<Address>();
      authorized.add(mechanicAddress);
      this.state.mechanicAuthorizations.set(key, authorized);
      emit({ type: 'mechanic.authorized', vin: key, mechanic: mechanicAddress, owner: address });

      return [...authorized];
    });
  }

  addMaintenanceRecord(caller: string, vin: string, description: string, critical: boolean): MaintenanceRecord {
    const address = toAddress(caller, 'caller');
    const key = toVin(vin);

    const vehicle = requireVehicle(this.state, key);
    requireRole(this.state, address, 'Mechanic');
    requireMechanicAuthorized(this.state, key, address);
    const text = requireText(description, 'description');

    return this.commit((emit, timestamp) => {
      const record: MaintenanceRecord = { mechanic: address, description: text, timestamp, critical };
      const byMechanic = this.state.maintenance.get(key) ?? new Map<Address, MaintenanceRecord[]>();
      const history = byMechanic.get(address) ?? [];
      history.push(record);
      byMechanic.set(address, history);
      this.state.maintenance.set(key, byMechanic);

      if (!vehicle.maintenanceProviders.includes(address)) {
        vehicle.maintenanceProviders.push(address);
      }
      emit({ type: 'maintenance.added', vin: key, mechanic: address, description: text, critical });

      return clone(record);
    });
  }

  getMaintenanceHistory(vin: string, mechanic: string): MaintenanceRecord[] {
    const key = toVin(vin);
    requireVehicle(this.state, key);
    return clone(this.state.maintenance.get(key)?.get(toAddress(mechanic, 'mechanic')) ?? []);
  }

  getAuthorizedMechanics(vin: string): Address[] {
    const key = toVin(vin);
    requireVehicle(this.state, key);
    return [...(this.state.mechanicAuthorizations.get(key) ?? [])];
  }

  /** Supersedes whatever policy the vehicle had; the old one stays in the history. */
  createInsurancePolicy(caller: string, vin: string, startDate: number, endDate: number): InsurancePolicyRecord {
    const address = toAddress(caller, 'caller');
    const key = toVin(vin);

    requireRole(this.state, address, 'InsuranceCompany', 'validation');
    const vehicle = this.state.vehicles.get(key);
    if (!vehicle?.registered) {
      throw new ValidationError(RegistryErrorCode.VEHICLE_NOT_REGISTERED, `Vehicle ${key} is not registered.`, {
        vin: key,
      });
    }
    if (!vehicle.currentOwner) {
      throw new ValidationError(RegistryErrorCode.VEHICLE_HAS_NO_OWNER, `Vehicle ${key} has no owner.`, { vin: key });
    }
    if (!Number.isFinite(startDate) || !Number.isFinite(endDate) || endDate <= startDate) {
      throw new ValidationError(RegistryErrorCode.INVALID_POLICY_PERIOD, 'endDate must be after startDate.', {
        startDate,
        endDate,
      });
    }

    return this.commit((emit, timestamp) => {
      const policy: InsurancePolicyRecord = {
        vin: key,
        insurer: address,
        vehicleOwner: vehicle.currentOwner,
        startDate,
        endDate,
        active: true,
        createdAt: timestamp,
      };

      this.state.policies.set(key, policy);
      const history = this.state.policyHistory.get(key) ?? [];
      history.push(policy);
      this.state.policyHistory.set(key, history);
      vehicle.currentInsurer = address;
      emit({
        type: 'insurance.policy-created',
        vin: key,
        insurer: address,
        vehicleOwner: policy.vehicleOwner,
        startDate,
        endDate,
      });

      return clone(policy);
    });
  }

  getInsurancePolicy(vin: string): InsurancePolicyRecord {
    const key = toVin(vin);
    const policy = this.state.policies.get(key);
    if (!policy) {
      throw new NotFoundError(RegistryErrorCode.POLICY_NOT_FOUND, `No policy for vehicle ${key}.`, { vin: key });
    }

    return clone(policy);
  }

  getPolicyHistory(vin: string): InsurancePolicyRecord[] {
    return clone(this.state.policyHistory.get(toVin(vin)) ?? []);
  }

  // --- DID documents ---

  storeDIDDocument(caller: string, did: string, document: string): DidDocumentRecord {
    const address = toAddress(caller, 'caller');
    const key = toDid(did);
    const payload = requireText(document, 'document');

    const existing = this.state.didDocuments.get(key);
    if (existing?.controller && existing.controller !== address) {
      throw new AuthorizationError(RegistryErrorCode.NOT_DID_CONTROLLER, 'Only the controller may update this DID document.', {
        did: key,
        controller: existing.controller,
      });
    }

    return this.commit((emit, timestamp) => {
      const record: DidDocumentRecord = {
        did: key,
        document: payload,
        timestamp,
        active: true,
        controller: address,
      };

      this.state.didDocuments.set(key, record);
      if (!this.state.registeredDids.has(key)) {
        this.state.registeredDids.add(key);
        emit({ type: 'did.registered', did: key, address, vin: null });
      }
      emit({ type: 'did-document.updated', did: key, controller: address });

      return clone(record);
    });
  }

  getDIDDocument(did: string): DidDocumentRecord {
    const key = toDid(did);
    if (!this.state.registeredDids.has(key)) {
      throw new NotFoundError(RegistryErrorCode.DID_NOT_FOUND, `DID ${key} is not registered.`, { did: key });
    }

    const record = this.state.didDocuments.get(key);
    return record ? clone(record) : { did: key, document: '', timestamp: 0, active: false, controller: null };
  }

  revokeDIDDocument(caller: string, did: string): DidDocumentRecord {
    const address = toAddress(caller, 'caller');
    const key = toDid(did);

    const record = this.state.didDocuments.get(key);
    if (!record) {
      throw new NotFoundError(RegistryErrorCode.DID_DOCUMENT_NOT_FOUND, `No document stored for ${key}.`, { did: key });
    }
    if (record.controller !== address) {
      throw new AuthorizationError(RegistryErrorCode.NOT_DID_CONTROLLER, 'Only the controller may revoke this DID document.', {
        did: key,
        controller: record.controller,
      });
    }
    if (!record.active) {
      throw new ValidationError(RegistryErrorCode.DID_DOCUMENT_REVOKED, `Document for ${key} is already revoked.`, {
        did: key,
      });
    }

    return this.commit((emit, timestamp) => {
      record.active = false;
      record.timestamp = timestamp;
      emit({ type: 'did-document.revoked', did: key, controller: address });
      return clone(record);
    });
  }

  // --- Credentials ---

  storeCredential(caller: string, input: StoreCredentialInput): CredentialRecord {
    const issuer = toAddress(caller, 'caller');
    const credentialId = requireText(input.credentialId, 'credentialId');
    const issuerDID = toDid(input.issuerDID, 'issuerDID');
    const subjectDID = toDid(input.subjectDID, 'subjectDID');
    const data = requireText(input.data, 'data');

    for (const [field, did] of [
      ['issuerDID', issuerDID],
      ['subjectDID', subjectDID],
    ]) {
      if (!this.isValidDID(did)) {
        throw new ValidationError(RegistryErrorCode.INVALID_DID, `${field} is not a valid registered DID.`, {
          field,
          did,
        });
      }
    }
    if (this.state.credentials.has(credentialId)) {
      throw new ConflictError(RegistryErrorCode.CREDENTIAL_EXISTS, `Credential ${credentialId} already stored.`, {
        credentialId,
      });
    }

    return this.commit((emit, timestamp) => {
      const credential: CredentialRecord = { credentialId, issuer, issuerDID, subjectDID, data, issuedAt: timestamp };
      this.state.credentials.set(credentialId, credential);
      emit({ type: 'credential.stored', credentialId, issuer, subjectDID });
      return clone(credential);
    });
  }

  getCredential(credentialId: string): CredentialRecord {
    const key = requireText(credentialId, 'credentialId');
    const credential = this.state.credentials.get(key);
    if (!credential) {
      throw new NotFoundError(RegistryErrorCode.CREDENTIAL_NOT_FOUND, `Credential ${key} not found.`, {
        credentialId: key,
      });
    }

    return clone(credential);
  }

  // --- Interaction log ---

  recordInteraction(input: RecordInteractionInput): InteractionRecord {
    const source = toAddress(input.source, 'source');
    const destination = toAddress(input.destination, 'destination');
    const sourceIdentifier = this.canonicalIdentifier(requireText(input.sourceIdentifier, 'sourceIdentifier'));
    const destinationIdentifier = this.canonicalIdentifier(
      requireText(input.destinationIdentifier, 'destinationIdentifier'),
    );
    const interactionType = requireText(input.interactionType, 'interactionType');

    if (!this.isPrincipalIdentifier(sourceIdentifier) && !this.isVehicleIdentifier(sourceIdentifier)) {
      throw new ValidationError(RegistryErrorCode.UNKNOWN_SOURCE, `Source ${sourceIdentifier} is not registered.`, {
        identifier: sourceIdentifier,
      });
    }
    this.requireDestination(destinationIdentifier);

    return this.commit((emit, timestamp) => {
      const interaction: InteractionRecord = {
        index: this.state.interactions.length,
        source,
        destination,
        sourceIdentifier,
        destinationIdentifier,
        interactionType,
        payload: input.payload ?? '',
        timestamp,
      };

      this.state.appendInteraction(interaction);
      emit({
        type: 'interaction.recorded',
        index: interaction.index,
        source,
        destination,
        sourceIdentifier,
        destinationIdentifier,
        interactionType,
      });

      return clone(interaction);
    });
  }

  queryByIdentifier(identifier: string): InteractionRecord[] {
    return this.interactionsAt(this.state.interactionsByIdentifier.get(this.canonicalIdentifier(identifier)) ?? []);
  }

  /** Interactions between the unordered pair {id1, id2}, oldest first. */
  queryBetween(id1: string, id2: string): InteractionRecord[] {
    const a = this.canonicalIdentifier(id1);
    const b = this.canonicalIdentifier(id2);
    const positions = this.state.interactionsByIdentifier.get(a) ?? [];

    return this.interactionsAt(positions).filter(
      (interaction) =>
        (interaction.sourceIdentifier === a && interaction.destinationIdentifier === b) ||
        (interaction.sourceIdentifier === b && interaction.destinationIdentifier === a),
    );
  }

  // --- internals ---

  private commit<T>(operation: (emit: Emit, timestamp: number) => T): T {
    const timestamp = this.clock();
    const sequence = this.state.sequence + 1;
    const pending: RegistryNotification[] = [];

    const result = operation((body) => pending.push({ ...body, sequence, timestamp }), timestamp);
    this.state.sequence = sequence;

    // listener failures are logged; the commit stands
    for (const notification of pending) {
      for (const listener of this.listeners) {
        try {
          listener(notification);
        } catch (error: unknown) {
          const stack = error instanceof Error ? error.stack : undefined;
          this.logger.error(`Listener failed on #${notification.sequence} ${notification.type}: ${String(error)}`, stack);
        }
      }
    }

    return result;
  }

  private bindDid(did: Did, address: Address): void {
    this.state.didToAddress.set(did, address);
    this.state.registeredDids.add(did);
  }

  private ownsDid(address: Address, did: Did): boolean {
    const principal = this.state.principals.get(address);
    return principal?.registered === true && (principal.entityDID === did || principal.walletDID === did);
  }

  private isPrincipalIdentifier(identifier: string): boolean {
    const address = this.state.didToAddress.get(identifier);
    return address !== undefined && this.ownsDid(address, identifier);
  }

  /** VINs of registered vehicles are logged in their upper-case form; other identifiers as given. */
  private canonicalIdentifier(identifier: string): string {
    const trimmed = identifier.trim();
    const vin = trimmed.toUpperCase();
    return this.state.vehicles.has(vin) ? vin : trimmed;
  }

  private isVehicleIdentifier(identifier: string): boolean {
    return this.state.vehicles.has(identifier.toUpperCase()) || this.state.vehicleDids.has(identifier);
  }

  private requireDestination(identifier: string): void {
    if (this.isPrincipalIdentifier(identifier) || this.isVehicleIdentifier(identifier)) {
      return;
    }

    const address = this.state.didToAddress.get(identifier);
    const unit = address ? this.state.roadsideUnits.get(address) : undefined;
    if (address && unit && (unit.entityDID === identifier || unit.walletDID === identifier)) {
      if (isActiveRoadsideUnit(this.state, address)) {
        return;
      }

      throw new ValidationError(RegistryErrorCode.ROADSIDE_UNIT_INACTIVE, `Roadside unit ${identifier} is inactive.`, {
        identifier,
      });
    }

    throw new ValidationError(RegistryErrorCode.UNKNOWN_DESTINATION, `Destination ${identifier} is not registered.`, {
      identifier,
    });
  }

  private interactionsAt(positions: number[]): InteractionRecord[] {
    return positions.flatMap((position) => {
      const interaction = this.state.interactions[position];
      return interaction ? [clone(interaction)] : [];
    });
  }
}
