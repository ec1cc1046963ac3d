import { Inject, Injectable, NotFoundException } from '@nestjs/common';

import { CollectionName, DOCUMENT_STORE, DocumentFilter, DocumentStore, StoredDocument } from '../database/document-store';
import { DerivedStateService } from './derived-state.service';
import { CreateVehicleDto } from './dto/create-vehicle.dto';
import { ListPartsQueryDto, ListVehiclesQueryDto } from './dto/list-query.dto';
import { LogEventDto } from './dto/log-event.dto';
import { RegisterPartDto } from './dto/register-part.dto';
import { DerivedStateOutcome, EventDocument, PartDocument, VehicleDocument } from './elv.types';
import { toEventDocument, toPartDocument, toVehicleDocument } from './entity-validator';

@Injectable()
export class ElvService {
  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(DerivedStateService) private readonly derivedState: DerivedStateService,
  ) {}

  async createVehicle(dto: CreateVehicleDto): Promise<StoredDocument> {
    const id = await this.persistVehicle(toVehicleDocument(dto));
    return this.loadCreated('vehicle', id);
  }

  async logEvent(dto: LogEventDto): Promise<StoredDocument> {
    const event = toEventDocument(dto);
    const id = await this.recordEvent(event);
    await this.applyDerivedState(event);
    return this.loadCreated('event', id);
  }

  async registerPart(dto: RegisterPartDto): Promise<StoredDocument> {
    const id = await this.persistPart(toPartDocument(dto));
    return this.loadCreated('part', id);
  }

  persistVehicle(vehicle: VehicleDocument): Promise<string> {
    return this.store.insert('vehicle', vehicle);
  }

  recordEvent(event: EventDocument): Promise<string> {
    return this.store.insert('event', event);
  }

  /** Vehicle side effect of an event that is already recorded. */
  applyDerivedState(event: EventDocument): Promise<DerivedStateOutcome> {
    return this.derivedState.apply(event);
  }

  persistPart(part: PartDocument): Promise<string> {
    return this.store.insert('part', part);
  }

  listVehicles(query: ListVehiclesQueryDto): Promise<StoredDocument[]> {
    const filter: DocumentFilter = {};
    if (query.status) {
      filter.status = query.status;
    }

    return this.store.findMany('vehicle', filter, {
      limit: query.limit,
      sort: { field: 'created_at', direction: 'desc' },
    });
  }

  async getVehicle(id: string): Promise<StoredDocument> {
    const vehicle = await this.store.findOne('vehicle', id);
    if (!vehicle) {
      throw new NotFoundException('Vehicle not found.');
    }

    return vehicle;
  }

  getVehicleHistory(vehicleId: string): Promise<StoredDocument[]> {
    return this.store.findMany(
      'event',
      { vehicle_id: vehicleId },
      { sort: { field: 'occurred_at', direction: 'asc' } },
    );
  }

  listParts(query: ListPartsQueryDto): Promise<StoredDocument[]> {
    const filter: DocumentFilter = {};
    if (query.vehicle_id) {
      filter.vehicle_id = query.vehicle_id;
    }

    return this.store.findMany('part', filter, {
      limit: query.limit,
      sort: { field: 'created_at', direction: 'desc' },
    });
  }

  private async loadCreated(collection: CollectionName, id: string): Promise<StoredDocument> {
    const doc = await this.store.findOne(collection, id);
    if (!doc) {
      throw new NotFoundException(`Created ${collection} ${id} could not be read back.`);
    }

    return doc;
  }
}
