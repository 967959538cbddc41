import { ArgumentException, Guard } from '../../../src';
import { optionalDate, requireDate, requireOneOf } from './common';

export const SHIPMENT_STATUSES = [
  'Created',
  'PickedUp',
  'InTransit',
  'OutForDelivery',
  'Delivered',
  'Delayed',
  'Exception',
  'Returned',
] as const;

export type ShipmentStatus = (typeof SHIPMENT_STATUSES)[number];

export interface Shipment {
  readonly id: string;
  readonly orderId: string;
  readonly clientId: string;
  readonly shipDate: Date;
  readonly carrier: string;
  readonly trackingNumber: string;
  readonly weight: number;
  readonly status: ShipmentStatus;
  /** Set once delivered */
  readonly deliveryDate?: Date;
}

export interface ShipmentInput {
  id: string;
  orderId: string;
  clientId: string;
  shipDate: Date;
  carrier: string;
  trackingNumber: string;
  weight: number;
  /** @defaultValue 'Created' */
  status?: ShipmentStatus;
  deliveryDate?: Date;
}

/**
 * @throws ArgumentException for blank text fields, a non-positive weight or a
 * delivery date before the ship date
 */
export function createShipment(input: ShipmentInput): Shipment {
  const shipDate = requireDate(input.shipDate, 'shipDate');
  const deliveryDate = optionalDate(input.deliveryDate, 'deliveryDate');

  if (deliveryDate && deliveryDate.getTime() < shipDate.getTime()) {
    throw new ArgumentException('Delivery date cannot be before ship date.', 'deliveryDate');
  }

  return {
    id: Guard.againstBlank(input.id, 'id'),
    orderId: Guard.againstBlank(input.orderId, 'orderId'),
    clientId: Guard.againstBlank(input.clientId, 'clientId'),
    shipDate,
    carrier: Guard.againstBlank(input.carrier, 'carrier'),
    trackingNumber: Guard.againstBlank(input.trackingNumber, 'trackingNumber'),
    weight: Guard.againstNonPositive(input.weight, 'weight', 'Weight must be greater than zero.'),
    status: requireOneOf(SHIPMENT_STATUSES, input.status ?? 'Created', 'status'),
    deliveryDate,
  };
}
