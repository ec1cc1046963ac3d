import { Inject, Injectable, Logger } from '@nestjs/common';

import { DOCUMENT_STORE, DocumentStore } from '../database/document-store';
import { DerivedStateOutcome, EventDocument, EventType, VehicleStatus } from './elv.types';

const VEHICLE_STATUS_BY_EVENT: Partial<Record<EventType, VehicleStatus>> = {
  dismantling: 'dismantled',
  scrap: 'scrapped',
};

export function deriveVehicleStatus(eventType: EventType): VehicleStatus | undefined {
  return VEHICLE_STATUS_BY_EVENT[eventType];
}

/**
 * Applies vehicle side effects of persisted events. A missing or unresolvable vehicle
 * reference skips the rule without failing; the event itself is already recorded.
 */
@Injectable()
export class DerivedStateService {
  private readonly logger = new Logger(DerivedStateService.name);

  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async apply(event: EventDocument): Promise<DerivedStateOutcome> {
    const status = deriveVehicleStatus(event.event_type);
    if (!status) {
      return { applied: false, reason: 'no-rule' };
    }

    if (!event.vehicle_id) {
      return { applied: false, reason: 'no-vehicle-reference' };
    }

    const matched = await this.store.update('vehicle', event.vehicle_id, {
      status,
      updated_at: new Date(),
    });

    if (!matched) {
      this.logger.debug(`Skipped ${event.event_type} rule: vehicle ${event.vehicle_id} not found`);
      return { applied: false, reason: 'vehicle-not-found' };
    }

    this.logger.debug(`Vehicle ${event.vehicle_id} status set to ${status} by ${event.event_type} event`);
    return { applied: true, vehicleId: event.vehicle_id, status };
  }
}
