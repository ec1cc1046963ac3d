import { BadRequestException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  CollectionName,
  DocumentData,
  DocumentStoreError,
  DocumentStoreUnavailableError,
} from '../../database/document-store';
import { InMemoryDocumentStore } from '../../database/in-memory-document-store';
import { DerivedStateService } from '../../elv/derived-state.service';
import { ElvService } from '../../elv/elv.service';
import { EntityValidator } from '../../elv/entity-validator';
import { orderMutations, SyncService } from '../sync.service';
import { Mutation } from '../sync.types';

function objectId(n: number): string {
  return n.toString(16).padStart(24, '0');
}

function sequentialIds(): () => string {
  let next = 0;
  return () => objectId(++next);
}

function createTestMutation(overrides: Partial<Mutation> = {}): Mutation {
  return {
    op: 'createVehicle',
    data: {},
    client_id: 'tablet-1',
    client_timestamp: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

class PartOutageStore extends InMemoryDocumentStore {
  async insert(collection: CollectionName, doc: DocumentData): Promise<string> {
    if (collection === 'part') {
      throw new DocumentStoreUnavailableError('Database unavailable during insert');
    }

    return super.insert(collection, doc);
  }
}

class VehicleUpdateOutageStore extends InMemoryDocumentStore {
  async update(collection: CollectionName, id: string, patch: DocumentData): Promise<boolean> {
    if (collection === 'vehicle') {
      throw new DocumentStoreError('Database update failed: write conflict');
    }

    return super.update(collection, id, patch);
  }
}

function createSyncService(store: InMemoryDocumentStore, config: Record<string, unknown> = {}): SyncService {
  const elv = new ElvService(store, new DerivedStateService(store));
  return new SyncService(new EntityValidator(), elv, new ConfigService(config));
}

describe('orderMutations', () => {
  it('orders by client timestamp and keeps input order for ties', () => {
    const ordered = orderMutations([
      createTestMutation({ client_id: 'a', client_timestamp: '2024-05-01T10:00:02Z' }),
      createTestMutation({ client_id: 'b', client_timestamp: '2024-05-01T10:00:01Z' }),
      createTestMutation({ client_id: 'c', client_timestamp: '2024-05-01T10:00:02Z' }),
      createTestMutation({ client_id: 'd', client_timestamp: '2024-05-01T10:00:01Z' }),
      createTestMutation({ client_id: 'e', client_timestamp: '2024-05-01T10:00:02Z' }),
    ]);

    expect(ordered.map((mutation) => mutation.client_id)).toEqual(['b', 'd', 'a', 'c', 'e']);
  });

  it('compares instants rather than strings', () => {
    const ordered = orderMutations([
      createTestMutation({ client_id: 'utc', client_timestamp: '2024-05-01T11:00:00Z' }),
      createTestMutation({ client_id: 'offset', client_timestamp: '2024-05-01T12:00:00+02:00' }),
    ]);

    expect(ordered.map((mutation) => mutation.client_id)).toEqual(['offset', 'utc']);
  });

  it('orders by digits past the millisecond', () => {
    const ordered = orderMutations([
      createTestMutation({ client_id: 'later', client_timestamp: '2024-05-01T10:00:00.0009Z' }),
      createTestMutation({ client_id: 'earlier', client_timestamp: '2024-05-01T10:00:00.0001Z' }),
    ]);

    expect(ordered.map((mutation) => mutation.client_id)).toEqual(['earlier', 'later']);
  });

  it('does not reorder the input array', () => {
    const input = [
      createTestMutation({ client_id: 'late', client_timestamp: '2024-05-02T00:00:00Z' }),
      createTestMutation({ client_id: 'early', client_timestamp: '2024-05-01T00:00:00Z' }),
    ];

    orderMutations(input);

    expect(input.map((mutation) => mutation.client_id)).toEqual(['late', 'early']);
  });
});

describe('SyncService', () => {
  let store: InMemoryDocumentStore;
  let sync: SyncService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    store = new InMemoryDocumentStore(sequentialIds());
    sync = createSyncService(store);
  });

  it('applies mutations with equal timestamps in input order', async () => {
    const { results } = await sync.reconcile([
      createTestMutation({ client_id: 'tablet-a', data: { vin: 'A' }, client_timestamp: '2024-05-01T10:00:02Z' }),
      createTestMutation({ client_id: 'tablet-b', data: { vin: 'B' }, client_timestamp: '2024-05-01T10:00:01Z' }),
      createTestMutation({ client_id: 'tablet-c', data: { vin: 'C' }, client_timestamp: '2024-05-01T10:00:02Z' }),
      createTestMutation({
        op: 'registerPart',
        client_id: 'tablet-d',
        data: { name: 'door' },
        client_timestamp: '2024-05-01T10:00:01Z',
      }),
    ]);

    expect(results.map((result) => result.client_id)).toEqual(['tablet-b', 'tablet-d', 'tablet-a', 'tablet-c']);
    expect(results).toEqual([
      expect.objectContaining({ op: 'createVehicle', status: 'ok', id: objectId(1) }),
      expect.objectContaining({ op: 'registerPart', status: 'ok', id: objectId(2) }),
      expect.objectContaining({ op: 'createVehicle', status: 'ok', id: objectId(3) }),
      expect.objectContaining({ op: 'createVehicle', status: 'ok', id: objectId(4) }),
    ]);

    const vehicles = await store.findMany('vehicle', {}, { sort: { field: 'created_at', direction: 'asc' } });
    expect(vehicles.map((vehicle) => vehicle.vin)).toEqual(['B', 'A', 'C']);
  });

  it('isolates a failing mutation from the rest of the batch', async () => {
    const { results } = await sync.reconcile([
      createTestMutation({ data: { vin: 'V1' }, client_timestamp: '2024-05-01T10:00:00Z' }),
      createTestMutation({ op: 'registerPart', data: { name: 'door' }, client_timestamp: '2024-05-01T10:00:02Z' }),
      createTestMutation({ data: { status: 'crushed' }, client_timestamp: '2024-05-01T10:00:01Z' }),
    ]);

    expect(results.map((result) => result.status)).toEqual(['ok', 'error', 'ok']);
    expect(results[1]).toEqual({
      op: 'createVehicle',
      client_id: 'tablet-1',
      client_timestamp: '2024-05-01T10:00:01Z',
      status: 'error',
      error: 'Invalid vehicle: status must be one of the following values: imported, active, dismantled, scrapped, sold, unknown',
      issues: [
        {
          field: 'status',
          constraint: 'isIn',
          message: 'status must be one of the following values: imported, active, dismantled, scrapped, sold, unknown',
        },
      ],
    });
    await expect(store.findMany('vehicle', {})).resolves.toHaveLength(1);
    await expect(store.findMany('part', {})).resolves.toHaveLength(1);
  });

  it('reports unknown operations as ignored and keeps going', async () => {
    const { results } = await sync.reconcile([
      createTestMutation({ op: 'foo', data: { anything: true }, client_timestamp: '2024-05-01T09:00:00Z' }),
      createTestMutation({ data: { vin: 'V2' }, client_timestamp: '2024-05-01T10:00:00Z' }),
    ]);

    expect(results).toEqual([
      {
        op: 'foo',
        client_id: 'tablet-1',
        client_timestamp: '2024-05-01T09:00:00Z',
        status: 'ignored',
        reason: 'unknown op',
      },
      {
        op: 'createVehicle',
        client_id: 'tablet-1',
        client_timestamp: '2024-05-01T10:00:00Z',
        status: 'ok',
        id: objectId(1),
      },
    ]);
  });

  it('dismantles a vehicle created earlier in the same batch', async () => {
    const vehicleId = objectId(1);

    const { results } = await sync.reconcile([
      createTestMutation({
        op: 'logEvent',
        data: { event_type: 'dismantling', vehicle_id: vehicleId },
        client_timestamp: '2024-05-01T10:05:00Z',
      }),
      createTestMutation({ data: { vin: 'X1' }, client_timestamp: '2024-05-01T10:00:00Z' }),
    ]);

    expect(results.map((result) => [result.op, result.status])).toEqual([
      ['createVehicle', 'ok'],
      ['logEvent', 'ok'],
    ]);
    expect(results[0]).toMatchObject({ id: vehicleId });

    const vehicle = await store.findOne('vehicle', vehicleId);
    expect(vehicle?.vin).toBe('X1');
    expect(vehicle?.status).toBe('dismantled');
  });

  it('leaves a vehicle dismantled after two dismantling events', async () => {
    const vehicleId = objectId(1);

    const { results } = await sync.reconcile([
      createTestMutation({ data: { vin: 'X2', status: 'active' }, client_timestamp: '2024-05-01T10:00:00Z' }),
      createTestMutation({
        op: 'logEvent',
        data: { event_type: 'dismantling', vehicle_id: vehicleId },
        client_timestamp: '2024-05-01T10:01:00Z',
      }),
      createTestMutation({
        op: 'logEvent',
        data: { event_type: 'dismantling', vehicle_id: vehicleId },
        client_timestamp: '2024-05-01T10:02:00Z',
      }),
    ]);

    expect(results.every((result) => result.status === 'ok')).toBe(true);
    await expect(store.findMany('vehicle', {})).resolves.toHaveLength(1);
    await expect(store.findMany('event', { vehicle_id: vehicleId })).resolves.toHaveLength(2);
    const vehicle = await store.findOne('vehicle', vehicleId);
    expect(vehicle?.status).toBe('dismantled');
  });

  it('records an event whose vehicle reference does not resolve', async () => {
    const { results } = await sync.reconcile([
      createTestMutation({
        op: 'logEvent',
        data: { event_type: 'scrap', vehicle_id: 'ffffffffffffffffffffffff' },
      }),
    ]);

    expect(results[0]).toMatchObject({ status: 'ok', id: objectId(1) });
    const event = await store.findOne('event', objectId(1));
    expect(event?.event_type).toBe('scrap');
  });

  it('stamps events without occurred_at between batch start and server_time', async () => {
    const batchStart = Date.now();

    const { results, server_time } = await sync.reconcile([
      createTestMutation({ op: 'logEvent', data: { event_type: 'note', notes: 'tow truck arrived' } }),
    ]);

    expect(results[0]).toMatchObject({ status: 'ok', id: objectId(1) });
    const event = await store.findOne('event', objectId(1));
    const occurredAt = event?.occurred_at;
    expect(occurredAt).toBeInstanceOf(Date);
    if (occurredAt instanceof Date) {
      expect(occurredAt.getTime()).toBeGreaterThanOrEqual(batchStart);
      expect(occurredAt.getTime()).toBeLessThanOrEqual(Date.parse(server_time));
    }
  });

  it('turns store failures into per-mutation errors', async () => {
    store = new PartOutageStore(sequentialIds());
    sync = createSyncService(store);

    const { results } = await sync.reconcile([
      createTestMutation({ op: 'registerPart', data: { name: 'gearbox' }, client_timestamp: '2024-05-01T10:00:00Z' }),
      createTestMutation({ data: { vin: 'V3' }, client_timestamp: '2024-05-01T10:00:01Z' }),
    ]);

    expect(results).toEqual([
      expect.objectContaining({ op: 'registerPart', status: 'error', error: 'Database unavailable during insert' }),
      expect.objectContaining({ op: 'createVehicle', status: 'ok', id: objectId(1) }),
    ]);
  });

  it('reports an event as applied when only its vehicle update fails', async () => {
    store = new VehicleUpdateOutageStore(sequentialIds());
    sync = createSyncService(store);

    const { results } = await sync.reconcile([
      createTestMutation({ data: { vin: 'V4' }, client_timestamp: '2024-05-01T10:00:00Z' }),
      createTestMutation({
        op: 'logEvent',
        data: { event_type: 'dismantling', vehicle_id: objectId(1) },
        client_timestamp: '2024-05-01T10:00:01Z',
      }),
    ]);

    expect(results[1]).toEqual({
      op: 'logEvent',
      client_id: 'tablet-1',
      client_timestamp: '2024-05-01T10:00:01Z',
      status: 'ok',
      id: objectId(2),
      warning: 'vehicle update failed: Database update failed: write conflict',
    });
    await expect(store.findMany('event', {})).resolves.toHaveLength(1);
    await expect(store.findOne('vehicle', objectId(1))).resolves.toEqual(expect.objectContaining({ status: 'unknown' }));
  });

  it('rejects event timestamps that cannot be read as calendar date-times', async () => {
    const { results } = await sync.reconcile([
      createTestMutation({ op: 'logEvent', data: { event_type: 'note', occurred_at: '2024-W05-3' } }),
    ]);

    expect(results[0]).toEqual(
      expect.objectContaining({
        status: 'error',
        issues: [expect.objectContaining({ field: 'occurred_at', constraint: 'isTimestamp' })],
      }),
    );
    await expect(store.findMany('event', {})).resolves.toHaveLength(0);
  });

  it('answers an empty batch with an empty result list', async () => {
    const response = await sync.reconcile([]);

    expect(response.results).toEqual([]);
    expect(Number.isNaN(Date.parse(response.server_time))).toBe(false);
  });

  it('rejects batches above the configured size before applying anything', async () => {
    sync = createSyncService(store, { SYNC_MAX_MUTATIONS: 2 });

    await expect(
      sync.reconcile([createTestMutation(), createTestMutation(), createTestMutation()]),
    ).rejects.toThrow(BadRequestException);
    await expect(store.findMany('vehicle', {})).resolves.toHaveLength(0);
  });
});
