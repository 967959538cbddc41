/**
 * Loads the warehouse fixture. Dates in the fixture are offsets
 * (`{ "days": -3, "hours": 6 }`) from the instant the data is loaded, so the
 * scenarios behave the same whenever they run.
 */

import { z } from 'zod';
import { ArgumentException, Clock, addDays, addHours, systemClock } from '../../../src';
import rawSampleData from './sample-data.json';
import { CLIENT_TIERS, Client, createClient } from '../models/Client';
import { INVENTORY_STATUSES, Inventory, createInventory } from '../models/Inventory';
import { LOCATION_TYPES, Location, createLocation } from '../models/Location';
import {
  ORDER_PRIORITIES,
  ORDER_STATUSES,
  Order,
  SHIPPING_METHODS,
  createOrder,
  createOrderLine,
} from '../models/Order';
import { PRODUCT_CATEGORIES, Product, createDimensions, createProduct } from '../models/Product';
import { SHIPMENT_STATUSES, Shipment, createShipment } from '../models/Shipment';

export interface WarehouseData {
  readonly clients: readonly Client[];
  readonly products: readonly Product[];
  readonly inventory: readonly Inventory[];
  readonly locations: readonly Location[];
  readonly orders: readonly Order[];
  readonly shipments: readonly Shipment[];
}

type IssuePath = readonly (string | number)[];

function formatPath(path: IssuePath): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    'data',
  );
}

function withArticle(noun: string): string {
  return /^[aeiou]/.test(noun) ? `an ${noun}` : `a ${noun}`;
}

/**
 * Turn the first schema issue into an `ArgumentException` naming its path.
 */
function toArgumentException(error: z.ZodError): ArgumentException {
  const [issue] = error.issues;
  const path = formatPath(issue.path);
  const paramName = issue.path.length > 0 ? String(issue.path[issue.path.length - 1]) : 'data';

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return new ArgumentException(`${path} must be ${withArticle(issue.expected)}.`, paramName);
    case z.ZodIssueCode.invalid_enum_value:
      return new ArgumentException(`${path} must be one of ${issue.options.join(', ')}.`, paramName);
    default:
      return new ArgumentException(`${path}: ${issue.message}`, paramName);
  }
}

/**
 * Fixture schema. Date fields are `{ days?, hours? }` offsets resolved
 * against `now`; omitted collections are empty.
 */
function createFixtureSchema(now: Date) {
  const offset = z
    .object({ days: z.number().optional(), hours: z.number().optional() })
    .transform(({ days, hours }) => addHours(addDays(now, days ?? 0), hours ?? 0));

  const client = z.object({
    id: z.string(),
    name: z.string(),
    contactEmail: z.string(),
    tier: z.enum(CLIENT_TIERS),
    contractStart: offset,
    contractEnd: offset.optional(),
    isActive: z.boolean().default(true),
  });

  const product = z.object({
    sku: z.string(),
    clientId: z.string(),
    name: z.string(),
    description: z.string().optional(),
    category: z.enum(PRODUCT_CATEGORIES),
    weight: z.number(),
    dimensions: z.object({ length: z.number(), width: z.number(), height: z.number() }),
    isFragile: z.boolean().default(false),
    isHazmat: z.boolean().default(false),
    requiresRefrigeration: z.boolean().default(false),
    unitCost: z.number().optional(),
    expiration: offset.optional(),
  });

  const inventory = z.object({
    id: z.string(),
    sku: z.string(),
    clientId: z.string(),
    locationId: z.string(),
    quantity: z.number(),
    reorderPoint: z.number(),
    maxQuantity: z.number(),
    lastCount: offset,
    status: z.enum(INVENTORY_STATUSES).optional(),
    quarantineUntil: offset.optional(),
  });

  const location = z.object({
    id: z.string(),
    zone: z.string(),
    aisle: z.string(),
    bay: z.string(),
    level: z.string(),
    type: z.enum(LOCATION_TYPES),
    isTemperatureControlled: z.boolean().default(false),
    maxWeight: z.number().optional(),
    isHazmatApproved: z.boolean().default(false),
  });

  const order = z.object({
    id: z.string(),
    clientId: z.string(),
    orderDate: offset,
    requiredDate: offset,
    priority: z.enum(ORDER_PRIORITIES),
    shippingMethod: z.enum(SHIPPING_METHODS),
    destinationCountry: z.string(),
    status: z.enum(ORDER_STATUSES),
    lines: z.array(
      z.object({
        sku: z.string(),
        quantityOrdered: z.number(),
        quantityPicked: z.number().optional(),
      }),
    ),
  });

  const shipment = z.object({
    id: z.string(),
    orderId: z.string(),
    clientId: z.string(),
    shipDate: offset,
    carrier: z.string(),
    trackingNumber: z.string(),
    weight: z.number(),
    status: z.enum(SHIPMENT_STATUSES).optional(),
    deliveryDate: offset.optional(),
  });

  return z.object({
    clients: z.array(client).default([]),
    products: z.array(product).default([]),
    inventory: z.array(inventory).default([]),
    locations: z.array(location).default([]),
    orders: z.array(order).default([]),
    shipments: z.array(shipment).default([]),
  });
}

/**
 * Validate a fixture and build domain records from it.
 *
 * @throws ArgumentException naming the first invalid field, or the domain
 * error of the first record a factory rejects
 */
export function parseWarehouseData(raw: unknown, now: Date): WarehouseData {
  const parsed = createFixtureSchema(now).safeParse(raw);
  if (!parsed.success) {
    throw toArgumentException(parsed.error);
  }
  const fixture = parsed.data;

  return {
    clients: fixture.clients.map((c) =>
      createClient({
        id: c.id,
        name: c.name,
        contactEmail: c.contactEmail,
        tier: c.tier,
        contractStartDate: c.contractStart,
        contractEndDate: c.contractEnd,
        isActive: c.isActive,
      }),
    ),

    products: fixture.products.map((p) =>
      createProduct({
        sku: p.sku,
        clientId: p.clientId,
        name: p.name,
        description: p.description,
        category: p.category,
        weight: p.weight,
        dimensions: createDimensions(p.dimensions.length, p.dimensions.width, p.dimensions.height),
        isFragile: p.isFragile,
        isHazmat: p.isHazmat,
        requiresRefrigeration: p.requiresRefrigeration,
        unitCost: p.unitCost,
        expirationDate: p.expiration,
      }),
    ),

    inventory: fixture.inventory.map((i) =>
      createInventory({
        id: i.id,
        sku: i.sku,
        clientId: i.clientId,
        locationId: i.locationId,
        quantity: i.quantity,
        reorderPoint: i.reorderPoint,
        maxQuantity: i.maxQuantity,
        lastCountDate: i.lastCount,
        status: i.status,
        quarantineUntil: i.quarantineUntil,
      }),
    ),

    locations: fixture.locations.map((l) => createLocation(l)),

    orders: fixture.orders.map((o) =>
      createOrder({
        id: o.id,
        clientId: o.clientId,
        orderDate: o.orderDate,
        requiredDate: o.requiredDate,
        priority: o.priority,
        shippingMethod: o.shippingMethod,
        destinationCountry: o.destinationCountry,
        status: o.status,
        lines: o.lines.map((line) => createOrderLine(line.sku, line.quantityOrdered, line.quantityPicked)),
      }),
    ),

    shipments: fixture.shipments.map((s) => createShipment(s)),
  };
}

/**
 * The bundled fixture, with offsets resolved against `clock()`.
 */
export function loadSampleData(clock: Clock = systemClock): WarehouseData {
  return parseWarehouseData(rawSampleData, clock());
}
