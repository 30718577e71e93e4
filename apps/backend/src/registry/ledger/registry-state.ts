import {
  Address,
  CredentialRecord,
  Did,
  DidDocumentRecord,
  InsurancePolicyRecord,
  InteractionRecord,
  MaintenanceRecord,
  PrincipalRecord,
  RoadsideUnitRecord,
  VehicleRecord,
  Vin,
} from '../registry.types';

export const SNAPSHOT_VERSION = 1;

export interface MaintenanceEntry {
  vin: Vin;
  mechanic: Address;
  records: MaintenanceRecord[];
}

export interface RegistrySnapshot {
  version: typeof SNAPSHOT_VERSION;
  sequence: number;
  principals: PrincipalRecord[];
  roadsideUnits: RoadsideUnitRecord[];
  didBindings: Array<[Did, Address]>;
  registeredDids: Did[];
  vehicles: VehicleRecord[];
  /** Each policy is stored once; the current policy of a VIN is the tail of its history. */
  policyHistory: Array<[Vin, InsurancePolicyRecord[]]>;
  mechanicAuthorizations: Array<[Vin, Address[]]>;
  maintenance: MaintenanceEntry[];
  didDocuments: DidDocumentRecord[];
  credentials: CredentialRecord[];
  interactions: InteractionRecord[];
}

/**
 * The registry's only mutable state. Primary maps hold records by their
 * stable key; the remaining maps are secondary indices that every write
 * keeps in step with the primaries.
 */
export class RegistryState {
  sequence = 0;

  readonly principals = new Map<Address, PrincipalRecord>();
  readonly roadsideUnits = new Map<Address, RoadsideUnitRecord>();
  readonly didToAddress = new Map<Did, Address>();
  readonly registeredDids = new Set<Did>();
  readonly vehicles = new Map<Vin, VehicleRecord>();
  readonly policies = new Map<Vin, InsurancePolicyRecord>();
  readonly policyHistory = new Map<Vin, InsurancePolicyRecord[]>();
  readonly mechanicAuthorizations = new Map<Vin, Set<Address>>();
  readonly maintenance = new Map<Vin, Map<Address, MaintenanceRecord[]>>();
  readonly didDocuments = new Map<Did, DidDocumentRecord>();
  readonly credentials = new Map<string, CredentialRecord>();
  readonly interactions: InteractionRecord[] = [];

  // indices
  readonly vehicleDids = new Map<Did, Vin>();
  readonly vehicleOrder = new Map<Vin, number>();
  readonly vehiclesByOwner = new Map<Address, Set<Vin>>();
  readonly interactionsByIdentifier = new Map<string, number[]>();

  addVehicle(vehicle: VehicleRecord): void {
    this.vehicleOrder.set(vehicle.vin, this.vehicles.size);
    this.vehicles.set(vehicle.vin, vehicle);
    this.vehicleDids.set(vehicle.entityDID, vehicle.vin);
    this.vehicleDids.set(vehicle.walletDID, vehicle.vin);
    this.indexOwner(vehicle.currentOwner, vehicle.vin);
  }

  moveVehicle(vin: Vin, from: Address, to: Address): void {
    this.vehiclesByOwner.get(from)?.delete(vin);
    this.indexOwner(to, vin);
  }

  vinsOwnedBy(owner: Address): Vin[] {
    const vins = [...(this.vehiclesByOwner.get(owner) ?? [])];
    return vins.sort((a, b) => (this.vehicleOrder.get(a) ?? 0) - (this.vehicleOrder.get(b) ?? 0));
  }

  appendInteraction(interaction: InteractionRecord): void {
    this.interactions.push(interaction);
    this.indexInteraction(interaction.sourceIdentifier, interaction.index);
    if (interaction.destinationIdentifier !== interaction.sourceIdentifier) {
      this.indexInteraction(interaction.destinationIdentifier, interaction.index);
    }
  }

  toSnapshot(): RegistrySnapshot {
    const snapshot: RegistrySnapshot = {
      version: SNAPSHOT_VERSION,
      sequence: this.sequence,
      principals: [...this.principals.values()],
      roadsideUnits: [...this.roadsideUnits.values()],
      didBindings: [...this.didToAddress.entries()],
      registeredDids: [...this.registeredDids],
      vehicles: [...this.vehicles.values()],
      policyHistory: [...this.policyHistory.entries()],
      mechanicAuthorizations: [...this.mechanicAuthorizations.entries()].map(
        ([vin, mechanics]): [Vin, Address[]] => [vin, [...mechanics]],
      ),
      maintenance: [...this.maintenance.entries()].flatMap(([vin, byMechanic]) =>
        [...byMechanic.entries()].map(([mechanic, records]) => ({ vin, mechanic, records })),
      ),
      didDocuments: [...this.didDocuments.values()],
      credentials: [...this.credentials.values()],
      interactions: this.interactions,
    };

    return structuredClone(snapshot);
  }

  static fromSnapshot(input: RegistrySnapshot): RegistryState {
    const snapshot = structuredClone(input);
    const state = new RegistryState();
    state.sequence = snapshot.sequence;

    for (const principal of snapshot.principals) {
      state.principals.set(principal.address, principal);
    }
    for (const unit of snapshot.roadsideUnits) {
      state.roadsideUnits.set(unit.address, unit);
    }
    for (const [did, address] of snapshot.didBindings) {
      state.didToAddress.set(did, address);
    }
    for (const did of snapshot.registeredDids) {
      state.registeredDids.add(did);
    }
    for (const vehicle of snapshot.vehicles) {
      state.addVehicle(vehicle);
    }
    for (const [vin, history] of snapshot.policyHistory) {
      state.policyHistory.set(vin, history);
      const current = history[history.length - 1];
      if (current) {
        state.policies.set(vin, current);
      }
    }
    for (const [vin, mechanics] of snapshot.mechanicAuthorizations) {
      state.mechanicAuthorizations.set(vin, new Set(mechanics));
    }
    for (const entry of snapshot.maintenance) {
      const byMechanic = state.maintenance.get(entry.vin) ?? new Map<Address, MaintenanceRecord[]>();
      byMechanic.set(entry.mechanic, entry.records);
      state.maintenance.set(entry.vin, byMechanic);
    }
    for (const document of snapshot.didDocuments) {
      state.didDocuments.set(document.did, document);
    }
    for (const credential of snapshot.credentials) {
      state.credentials.set(credential.credentialId, credential);
    }
    for (const interaction of snapshot.interactions) {
      state.appendInteraction(interaction);
    }

    return state;
  }

  private indexOwner(owner: Address, vin: Vin): void {
    const vins = this.vehiclesByOwner.get(owner) ?? new Set<Vin>();
    vins.add(vin);
    this.vehiclesByOwner.set(owner, vins);
  }

  private indexInteraction(identifier: string, index: number): void {
    const positions = this.interactionsByIdentifier.get(identifier) ?? [];
    positions.push(index);
    this.interactionsByIdentifier.set(identifier, positions);
  }
}

export function isRegistrySnapshot(value: unknown): value is RegistrySnapshot {
  if (!value || typeof value !== 'object') {
    return false;
  }

  const candidate: Record<string, unknown> = { ...value };
  const listKeys = [
    'principals',
    'roadsideUnits',
    'didBindings',
    'registeredDids',
    'vehicles',
    'policyHistory',
    'mechanicAuthorizations',
    'maintenance',
    'didDocuments',
    'credentials',
    'interactions',
  ];

  return (
    candidate.version === SNAPSHOT_VERSION &&
    typeof candidate.sequence === 'number' &&
    listKeys.every((key) => Array.isArray(candidate[key]))
  );
}
