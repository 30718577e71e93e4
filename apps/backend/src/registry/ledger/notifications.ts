import { Address, Did, Role, Vin } from '../registry.types';

export type NotificationBody =
  | {
      type: 'principal.registered';
      address: Address;
      name: string;
      role: Role;
      entityDID: Did;
      walletDID: Did;
    }
  | {
      type: 'roadside-unit.registered';
      address: Address;
      name: string;
      location: string;
      entityDID: Did;
      walletDID: Did;
    }
  | { type: 'roadside-unit.deactivated'; address: Address }
  | { type: 'did.registered'; did: Did; address: Address | null; vin: Vin | null }
  | {
      type: 'vehicle.registered';
      vin: Vin;
      owner: Address;
      entityDID: Did;
      walletDID: Did;
      registeredBy: Address;
    }
  | { type: 'vehicle.ownership-transferred'; vin: Vin; previousOwner: Address; newOwner: Address }
  | { type: 'vehicle.config-updated'; vin: Vin; walletDID: Did; updatedBy: Address }
  | { type: 'mechanic.authorized'; vin: Vin; mechanic: Address; owner: Address }
  | { type: 'maintenance.added'; vin: Vin; mechanic: Address; description: string; critical: boolean }
  | {
      type: 'insurance.policy-created';
      vin: Vin;
      insurer: Address;
      vehicleOwner: Address;
      startDate: number;
      endDate: number;
    }
  | { type: 'insurance.policy-deactivated'; vin: Vin; insurer: Address; reason: 'ownership-transfer' }
  | { type: 'did-document.updated'; did: Did; controller: Address }
  | { type: 'did-document.revoked'; did: Did; controller: Address }
  | { type: 'credential.stored'; credentialId: string; issuer: Address; subjectDID: Did }
  | {
      type: 'interaction.recorded';
      index: number;
      source: Address;
      destination: Address;
      sourceIdentifier: string;
      destinationIdentifier: string;
      interactionType: string;
    };

export type NotificationType = NotificationBody['type'];

/** A committed change. `sequence` is the commit height that produced it. */
export type RegistryNotification = NotificationBody & {
  sequence: number;
  timestamp: number;
};

export type NotificationListener = (notification: RegistryNotification) => void;
