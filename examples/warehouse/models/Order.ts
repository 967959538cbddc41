import { ArgumentException, Guard } from '../../../src';
import { requireDate, requireOneOf } from './common';

export const ORDER_PRIORITIES = ['Low', 'Normal', 'High', 'Rush', 'SameDay'] as const;
export type OrderPriority = (typeof ORDER_PRIORITIES)[number];

export const SHIPPING_METHODS = [
  'Ground',
  'TwoDayAir',
  'Overnight',
  'International',
  'Freight',
] as const;
export type ShippingMethod = (typeof SHIPPING_METHODS)[number];

export const ORDER_STATUSES = [
  'Pending',
  'InProgress',
  'Picked',
  'Packed',
  'Shipped',
  'Delivered',
  'Cancelled',
  'OnHold',
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderLine {
  readonly sku: string;
  readonly quantityOrdered: number;
  readonly quantityPicked: number;
}

/**
 * @throws ArgumentException for a blank SKU, a non-positive ordered quantity
 * or a picked quantity outside `[0, quantityOrdered]`
 */
export function createOrderLine(sku: string, quantityOrdered: number, quantityPicked = 0): OrderLine {
  Guard.againstNonPositive(quantityOrdered, 'quantityOrdered', 'Quantity ordered must be greater than zero.');
  Guard.againstNegative(quantityPicked, 'quantityPicked', 'Quantity picked cannot be negative.');

  if (quantityPicked > quantityOrdered) {
    throw new ArgumentException('Quantity picked cannot exceed quantity ordered.', 'quantityPicked');
  }

  return { sku: Guard.againstBlank(sku, 'sku'), quantityOrdered, quantityPicked };
}

export interface Order {
  readonly id: string;
  readonly clientId: string;
  readonly orderDate: Date;
  readonly requiredDate: Date;
  readonly priority: OrderPriority;
  readonly shippingMethod: ShippingMethod;
  /** Country name or code, e.g. `"USA"` */
  readonly destinationCountry: string;
  readonly status: OrderStatus;
  readonly lines: readonly OrderLine[];
}

export interface OrderInput {
  id: string;
  clientId: string;
  orderDate: Date;
  requiredDate: Date;
  priority: OrderPriority;
  shippingMethod: ShippingMethod;
  destinationCountry: string;
  status: OrderStatus;
  lines: readonly OrderLine[];
}

/**
 * @throws ArgumentException for blank identifiers, an empty line list or a
 * required date before the order date
 */
export function createOrder(input: OrderInput): Order {
  const orderDate = requireDate(input.orderDate, 'orderDate');
  const requiredDate = requireDate(input.requiredDate, 'requiredDate');

  if (!input.lines || input.lines.length === 0) {
    throw new ArgumentException('Order must have at least one line item.', 'lines');
  }
  if (requiredDate.getTime() < orderDate.getTime()) {
    throw new ArgumentException('Required date must be on or after order date.', 'requiredDate');
  }

  return {
    id: Guard.againstBlank(input.id, 'id'),
    clientId: Guard.againstBlank(input.clientId, 'clientId'),
    orderDate,
    requiredDate,
    priority: requireOneOf(ORDER_PRIORITIES, input.priority, 'priority'),
    shippingMethod: requireOneOf(SHIPPING_METHODS, input.shippingMethod, 'shippingMethod'),
    destinationCountry: Guard.againstBlank(input.destinationCountry, 'destinationCountry'),
    status: requireOneOf(ORDER_STATUSES, input.status, 'status'),
    lines: [...input.lines],
  };
}
