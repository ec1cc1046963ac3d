export const CONDITION_LEVELS = ['good', 'fair', 'poor', 'unknown'] as const;
export type ConditionLevel = (typeof CONDITION_LEVELS)[number];

export const DAMAGE_LEVELS = ['none', 'minor', 'moderate', 'severe', 'unknown'] as const;
export type DamageLevel = (typeof DAMAGE_LEVELS)[number];

export const VEHICLE_STATUSES = ['imported', 'active', 'dismantled', 'scrapped', 'sold', 'unknown'] as const;
export type VehicleStatus = (typeof VEHICLE_STATUSES)[number];

export const EVENT_TYPES = [
  'ownership_change',
  'dismantling',
  'recycling',
  'scrap',
  'inspection',
  'location_update',
  'note',
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export const PART_CONDITIONS = ['new', 'used', 'damaged', 'unknown'] as const;
export type PartCondition = (typeof PART_CONDITIONS)[number];

export type EntityKind = 'vehicle' | 'event' | 'part';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Intentionally unconstrained key-value data (geo objects, event metadata). */
export type OpenMap = Record<string, JsonValue>;

export type VehicleDocument = {
  vin?: string;
  make?: string;
  model?: string;
  year?: number;
  engine_condition: ConditionLevel;
  body_condition: ConditionLevel;
  damage_level: DamageLevel;
  photos?: string[];
  last_known_location?: OpenMap;
  owner_id?: string;
  status: VehicleStatus;
};

export type EventDocument = {
  vehicle_id?: string;
  event_type: EventType;
  actor_id?: string;
  notes?: string;
  metadata?: OpenMap;
  location?: OpenMap;
  occurred_at: Date;
};

export type PartDocument = {
  vehicle_id?: string;
  name: string;
  serial_number?: string;
  condition: PartCondition;
  location?: string;
  price_etb?: number;
};

export type DerivedStateOutcome =
  | { applied: false; reason: 'no-rule' | 'no-vehicle-reference' | 'vehicle-not-found' }
  | { applied: true; vehicleId: string; status: VehicleStatus };
