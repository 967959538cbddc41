import { Guard } from '../../../src';
import { requireOneOf } from './common';

export const LOCATION_TYPES = [
  'Receiving',
  'Storage',
  'Picking',
  'Packing',
  'Shipping',
  'Quarantine',
  'Returns',
] as const;

export type LocationType = (typeof LOCATION_TYPES)[number];

export const DEFAULT_LOCATION_MAX_WEIGHT = 5000;

export interface Location {
  readonly id: string;
  readonly zone: string;
  readonly aisle: string;
  readonly bay: string;
  readonly level: string;
  readonly type: LocationType;
  readonly isTemperatureControlled: boolean;
  readonly maxWeight: number;
  readonly isHazmatApproved: boolean;
}

export interface LocationInput {
  id: string;
  zone: string;
  aisle: string;
  bay: string;
  level: string;
  type: LocationType;
  isTemperatureControlled?: boolean;
  /** @defaultValue 5000 */
  maxWeight?: number;
  isHazmatApproved?: boolean;
}

export function createLocation(input: LocationInput): Location {
  return {
    id: Guard.againstBlank(input.id, 'id'),
    zone: Guard.againstBlank(input.zone, 'zone'),
    aisle: Guard.againstBlank(input.aisle, 'aisle'),
    bay: Guard.againstBlank(input.bay, 'bay'),
    level: Guard.againstBlank(input.level, 'level'),
    type: requireOneOf(LOCATION_TYPES, input.type, 'type'),
    isTemperatureControlled: input.isTemperatureControlled ?? false,
    maxWeight: Guard.againstNonPositive(
      input.maxWeight ?? DEFAULT_LOCATION_MAX_WEIGHT,
      'maxWeight',
      'Max weight must be greater than zero.',
    ),
    isHazmatApproved: input.isHazmatApproved ?? false,
  };
}
