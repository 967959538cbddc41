import { ArgumentException, Guard } from '../../../src';
import { optionalDate, requireDate, requireOneOf } from './common';

export const INVENTORY_STATUSES = [
  'Available',
  'Reserved',
  'Quarantine',
  'Damaged',
  'Expired',
  'InTransit',
] as const;

export type InventoryStatus = (typeof INVENTORY_STATUSES)[number];

/**
 * Stock of one SKU held at one location.
 */
export interface Inventory {
  readonly id: string;
  readonly sku: string;
  readonly clientId: string;
  readonly locationId: string;
  readonly quantity: number;
  readonly reorderPoint: number;
  readonly maxQuantity: number;
  readonly lastCountDate: Date;
  readonly status: InventoryStatus;
  /** Set while stock is held in quarantine */
  readonly quarantineUntil?: Date;
}

export interface InventoryInput {
  id: string;
  sku: string;
  clientId: string;
  locationId: string;
  quantity: number;
  reorderPoint: number;
  maxQuantity: number;
  lastCountDate: Date;
  /** @defaultValue 'Available' */
  status?: InventoryStatus;
  quarantineUntil?: Date;
}

/**
 * @throws ArgumentException for blank identifiers, negative quantities or a
 * maximum below the reorder point
 */
export function createInventory(input: InventoryInput): Inventory {
  const quantity = Guard.againstNegative(input.quantity, 'quantity', 'Quantity cannot be negative.');
  const reorderPoint = Guard.againstNegative(
    input.reorderPoint,
    'reorderPoint',
    'Reorder point cannot be negative.',
  );
  const maxQuantity = Guard.againstNonFinite(input.maxQuantity, 'maxQuantity');

  if (maxQuantity < reorderPoint) {
    throw new ArgumentException(
      'Max quantity must be greater than or equal to reorder point.',
      'maxQuantity',
    );
  }

  return {
    id: Guard.againstBlank(input.id, 'id'),
    sku: Guard.againstBlank(input.sku, 'sku'),
    clientId: Guard.againstBlank(input.clientId, 'clientId'),
    locationId: Guard.againstBlank(input.locationId, 'locationId'),
    quantity,
    reorderPoint,
    maxQuantity,
    lastCountDate: requireDate(input.lastCountDate, 'lastCountDate'),
    status: requireOneOf(INVENTORY_STATUSES, input.status ?? 'Available', 'status'),
    quarantineUntil: optionalDate(input.quarantineUntil, 'quarantineUntil'),
  };
}
