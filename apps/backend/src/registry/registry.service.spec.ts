import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { RegistryErrorCode } from './ledger/errors';
import { RegistryLedger } from './ledger/registry-ledger';
import { RegistryNotification } from './ledger/notifications';
import { RegistrySnapshot } from './ledger/registry-state';
import { RegistryService } from './registry.service';
import { SnapshotStore } from './snapshot.store';

const ALICE = `0x${'a1'.repeat(32)}`;
const CAROL = `0x${'c0'.repeat(32)}`;

describe('RegistryService', () => {
  let service: RegistryService;
  let events: EventEmitter2;
  let snapshots: jest.Mocked<Pick<SnapshotStore, 'load' | 'save' | 'flush'>>;

  const createService = async (stored: RegistrySnapshot | null = null) => {
    snapshots = {
      load: jest.fn().mockResolvedValue(stored),
      save: jest.fn().mockResolvedValue(undefined),
      flush: jest.fn().mockResolvedValue(undefined),
    };
    events = new EventEmitter2();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RegistryService,
        { provide: EventEmitter2, useValue: events },
        { provide: SnapshotStore, useValue: snapshots },
        { provide: ConfigService, useValue: new ConfigService({ DID_METHOD: 'test' }) },
      ],
    }).compile();
    await module.init();

    return module.get<RegistryService>(RegistryService);
  };

  beforeEach(async () => {
    service = await createService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('forwards committed notifications to the event bus under their type', async () => {
    const received: RegistryNotification[] = [];
    events.on('principal.registered', (notification: RegistryNotification) => received.push(notification));

    await service.registerPrincipal(ALICE, {
      name: 'Alice',
      role: 'Individual',
      entityDID: 'did:alice:e',
      walletDID: 'did:alice:w',
    });

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      type: 'principal.registered',
      address: ALICE,
      role: 'Individual',
      sequence: 1,
    });
  });

  it('persists a snapshot after each commit', async () => {
    await service.registerPrincipal(ALICE, {
      name: 'Alice',
      role: 'Individual',
      entityDID: 'did:alice:e',
      walletDID: 'did:alice:w',
    });

    expect(snapshots.save).toHaveBeenCalledTimes(1);
    expect(snapshots.save).toHaveBeenCalledWith(expect.objectContaining({ version: 1, sequence: 1 }));
  });

  it('neither persists nor notifies when an operation is rejected', async () => {
    const listener = jest.fn();
    await service.registerPrincipal(ALICE, {
      name: 'Alice',
      role: 'Individual',
      entityDID: 'did:alice:e',
      walletDID: 'did:alice:w',
    });
    events.onAny(listener);

    await expect(
      service.registerPrincipal(ALICE, {
        name: 'Alice again',
        role: 'Mechanic',
        entityDID: 'did:alice:e2',
        walletDID: 'did:alice:w2',
      }),
    ).rejects.toMatchObject({ code: RegistryErrorCode.ALREADY_REGISTERED });

    expect(snapshots.save).toHaveBeenCalledTimes(1);
    expect(listener).not.toHaveBeenCalled();
    expect(service.sequence).toBe(1);
  });

  it('onboards a wallet with minted DIDs and a document for each', async () => {
    const result = await service.onboard({ address: ALICE, publicKey: 'cHVibGlj' }, { name: 'Garage', role: 'Mechanic' });

    expect(result.principal.entityDID).toMatch(/^did:test:entity:[0-9a-f-]{36}$/);
    expect(result.principal.walletDID).toMatch(/^did:test:wallet:[0-9a-f-]{36}$/);
    expect(service.resolveDid(result.principal.entityDID)).toEqual({
      did: result.principal.entityDID,
      registered: true,
      valid: true,
      address: ALICE,
    });

    expect(result.entityDocument.controller).toBe(ALICE);
    expect(JSON.parse(result.entityDocument.document)).toMatchObject({
      id: result.principal.entityDID,
      type: ['Mechanic'],
      controller: ALICE,
      verificationMethod: [{ controller: result.principal.entityDID, publicKeyBase64: 'cHVibGlj' }],
      service: [{ serviceEndpoint: result.principal.walletDID }],
    });
    expect(JSON.parse(result.walletDocument.document)).toMatchObject({
      id: result.principal.walletDID,
      type: ['Wallet'],
    });

    expect(service.sequence).toBe(3);
    expect(snapshots.save).toHaveBeenCalledTimes(1);
    expect(snapshots.save).toHaveBeenCalledWith(expect.objectContaining({ sequence: 3 }));
  });

  it('saves nothing when onboarding an address that is already registered', async () => {
    await service.registerPrincipal(ALICE, {
      name: 'Alice',
      role: 'Individual',
      entityDID: 'did:alice:e',
      walletDID: 'did:alice:w',
    });

    await expect(
      service.onboard({ address: ALICE, publicKey: 'cHVibGlj' }, { name: 'Garage', role: 'Mechanic' }),
    ).rejects.toMatchObject({ code: RegistryErrorCode.ALREADY_REGISTERED });

    expect(service.sequence).toBe(1);
    expect(snapshots.save).toHaveBeenCalledTimes(1);
  });

  it('persists and resolves even when an event handler throws', async () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    events.on('principal.registered', () => {
      throw new Error('handler down');
    });

    const principal = await service.registerPrincipal(ALICE, {
      name: 'Alice',
      role: 'Individual',
      entityDID: 'did:alice:e',
      walletDID: 'did:alice:w',
    });

    expect(principal.address).toBe(ALICE);
    expect(snapshots.save).toHaveBeenCalledWith(expect.objectContaining({ sequence: 1 }));
  });

  it('restores from the stored snapshot on init and keeps forwarding notifications', async () => {
    const seed = new RegistryLedger();
    seed.registerPrincipal(ALICE, {
      name: 'Alice',
      role: 'Individual',
      entityDID: 'did:alice:e',
      walletDID: 'did:alice:w',
    });

    service = await createService(seed.exportSnapshot());
    const received: RegistryNotification[] = [];
    events.on('principal.registered', (notification: RegistryNotification) => received.push(notification));

    expect(service.sequence).toBe(1);
    expect(service.listPrincipals().map((principal) => principal.address)).toEqual([ALICE]);

    await service.registerPrincipal(CAROL, {
      name: 'Carol',
      role: 'Individual',
      entityDID: 'did:carol:e',
      walletDID: 'did:carol:w',
    });

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ address: CAROL, sequence: 2 });
  });

  it('flushes pending snapshot writes on shutdown', async () => {
    await service.onApplicationShutdown();

    expect(snapshots.flush).toHaveBeenCalledTimes(1);
  });
});
