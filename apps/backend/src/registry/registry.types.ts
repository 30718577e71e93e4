export type Address = string;
export type Did = string;
export type Vin = string;

export const ROLES = [
  'Individual',
  'Mechanic',
  'InsuranceCompany',
  'RoadsideUnit',
  'VehicleManufacturer',
  'Car',
] as const;

export type Role = (typeof ROLES)[number];

export interface PrincipalRecord {
  address: Address;
  name: string;
  role: Role;
  entityDID: Did;
  walletDID: Did;
  registered: boolean;
  registeredAt: number;
}

export interface RoadsideUnitRecord {
  address: Address;
  name: string;
  location: string;
  entityDID: Did;
  walletDID: Did;
  active: boolean;
  registeredAt: number;
}

export interface VehicleRecord {
  vin: Vin;
  make: string;
  model: string;
  year: number;
  currentOwner: Address;
  /** Append-only. Each transfer appends the incoming owner. */
  previousOwners: Address[];
  entityDID: Did;
  walletDID: Did;
  credentialDID: Did | null;
  registered: boolean;
  currentInsurer: Address | null;
  maintenanceProviders: Address[];
  /** JSON settings document, set by the owner through the vehicle's wallet DID. */
  config: string | null;
  configUpdatedAt: number | null;
  registeredAt: number;
}

export interface InsurancePolicyRecord {
  vin: Vin;
  insurer: Address;
  vehicleOwner: Address;
  startDate: number;
  endDate: number;
  active: boolean;
  createdAt: number;
}

export interface MaintenanceRecord {
  mechanic: Address;
  description: string;
  timestamp: number;
  critical: boolean;
}

export interface DidDocumentRecord {
  did: Did;
  document: string;
  timestamp: number;
  active: boolean;
  controller: Address | null;
}

export interface CredentialRecord {
  credentialId: string;
  /** Address that submitted the credential, not the claimed issuer DID. */
  issuer: Address;
  issuerDID: Did;
  subjectDID: Did;
  data: string;
  issuedAt: number;
}

export interface InteractionRecord {
  index: number;
  source: Address;
  destination: Address;
  sourceIdentifier: string;
  destinationIdentifier: string;
  interactionType: string;
  payload: string;
  timestamp: number;
}

export interface RegisterPrincipalInput {
  name: string;
  role: Role;
  entityDID: Did;
  walletDID: Did;
}

export interface RegisterRoadsideUnitInput {
  name: string;
  location: string;
  entityDID: Did;
  walletDID: Did;
}

export interface RegisterVehicleInput {
  vin: Vin;
  ownerDID: Did;
  entityDID: Did;
  year: number;
  make: string;
  model: string;
  walletDID: Did;
  credentialDID?: Did;
}

export interface StoreCredentialInput {
  credentialId: string;
  issuerDID: Did;
  subjectDID: Did;
  data: string;
}

export interface RecordInteractionInput {
  source: Address;
  destination: Address;
  sourceIdentifier: string;
  destinationIdentifier: string;
  interactionType: string;
  payload?: string;
}
