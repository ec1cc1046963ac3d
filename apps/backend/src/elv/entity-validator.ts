import { Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';

import { flattenValidationErrors, ValidationIssue } from '../common/validation';
import { CreateVehicleDto } from './dto/create-vehicle.dto';
import { LogEventDto } from './dto/log-event.dto';
import { RegisterPartDto } from './dto/register-part.dto';
import { EntityKind, EventDocument, PartDocument, VehicleDocument } from './elv.types';

export class EntityValidationError extends Error {
  constructor(
    readonly kind: EntityKind,
    readonly issues: ValidationIssue[],
  ) {
    super(`Invalid ${kind}: ${issues.map((issue) => issue.message).join('; ')}`);
    this.name = 'EntityValidationError';
  }
}

export function toVehicleDocument(dto: CreateVehicleDto): VehicleDocument {
  return {
    vin: dto.vin,
    make: dto.make,
    model: dto.model,
    year: dto.year,
    engine_condition: dto.engine_condition ?? 'unknown',
    body_condition: dto.body_condition ?? 'unknown',
    damage_level: dto.damage_level ?? 'unknown',
    photos: dto.photos,
    last_known_location: dto.last_known_location,
    owner_id: dto.owner_id,
    status: dto.status ?? 'unknown',
  };
}

export function toEventDocument(dto: LogEventDto, receivedAt: Date = new Date()): EventDocument {
  return {
    vehicle_id: dto.vehicle_id,
    event_type: dto.event_type,
    actor_id: dto.actor_id,
    notes: dto.notes,
    metadata: dto.metadata,
    location: dto.location,
    occurred_at: dto.occurred_at ? new Date(dto.occurred_at) : receivedAt,
  };
}

export function toPartDocument(dto: RegisterPartDto): PartDocument {
  return {
    vehicle_id: dto.vehicle_id,
    name: dto.name,
    serial_number: dto.serial_number,
    condition: dto.condition ?? 'unknown',
    location: dto.location,
    price_etb: dto.price_etb,
  };
}

/**
 * Validates raw payloads (sync mutation data) against the same DTO rules the HTTP routes use
 * and returns the normalized document. Never touches the store.
 */
@Injectable()
export class EntityValidator {
  async validateVehicle(payload: Record<string, unknown>): Promise<VehicleDocument> {
    return toVehicleDocument(await this.check('vehicle', CreateVehicleDto, payload));
  }

  async validateEvent(payload: Record<string, unknown>): Promise<EventDocument> {
    return toEventDocument(await this.check('event', LogEventDto, payload));
  }

  async validatePart(payload: Record<string, unknown>): Promise<PartDocument> {
    return toPartDocument(await this.check('part', RegisterPartDto, payload));
  }

  private async check<T extends object>(
    kind: EntityKind,
    cls: ClassConstructor<T>,
    payload: Record<string, unknown>,
  ): Promise<T> {
    const instance = plainToInstance(cls, payload);
    const errors = await validate(instance, { whitelist: true, forbidNonWhitelisted: true });

    if (errors.length > 0) {
      throw new EntityValidationError(kind, flattenValidationErrors(errors));
    }

    return instance;
  }
}
