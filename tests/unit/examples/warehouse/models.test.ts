/**
 * @fileoverview Unit tests for warehouse domain record factories
 */

import { ArgumentException, ArgumentNullException } from '../../../../src';
import {
  ClientTier,
  createClient,
  createDimensions,
  createInventory,
  createLocation,
  createOrder,
  createOrderLine,
  createProduct,
  createShipment,
  oneOf,
  requireOneOf,
  CLIENT_TIERS,
} from '../../../../examples/warehouse/models';

const START = new Date('2024-01-01T00:00:00Z');
const LATER = new Date('2024-12-31T00:00:00Z');

describe('Warehouse models', () => {
  describe('literal sets', () => {
    it('oneOf narrows to the set', () => {
      const isTier = oneOf(CLIENT_TIERS);
      expect(isTier('Premium')).toBe(true);
      expect(isTier('Gold')).toBe(false);
      expect(isTier(3)).toBe(false);
    });

    it('requireOneOf names the accepted values', () => {
      const gold = 'Gold' as unknown as ClientTier;
      expect(() => requireOneOf(CLIENT_TIERS, gold, 'tier')).toThrow(
        "tier must be one of: Standard, Premium, Enterprise. Received 'Gold'.",
      );
    });
  });

  describe('createClient', () => {
    const input = {
      id: 'C-1',
      name: 'Test Client',
      contactEmail: 'ops@example.com',
      tier: 'Premium' as const,
      contractStartDate: START,
    };

    it('defaults to active with an open-ended contract', () => {
      const client = createClient(input);
      expect(client.isActive).toBe(true);
      expect(client.contractEndDate).toBeUndefined();
    });

    it('requires the end date after the start date', () => {
      expect(() => createClient({ ...input, contractEndDate: START })).toThrow(
        'Contract end date must be after start date.',
      );
      expect(createClient({ ...input, contractEndDate: LATER }).contractEndDate).toEqual(LATER);
    });

    it('rejects blank names and invalid dates', () => {
      expect(() => createClient({ ...input, name: ' ' })).toThrowErrorType(ArgumentException);
      expect(() => createClient({ ...input, contractStartDate: new Date('nope') })).toThrow(
        'contractStartDate must be a valid date.',
      );
    });
  });

  describe('createProduct', () => {
    const input = {
      sku: 'SKU-1',
      clientId: 'C-1',
      name: 'Widget',
      category: 'General' as const,
      weight: 2,
      dimensions: createDimensions(10, 20, 5),
    };

    it('computes volume', () => {
      expect(input.dimensions.volume).toBe(1000);
    });

    it('rejects non-positive dimensions', () => {
      expect(() => createDimensions(10, 0, 5)).toThrow('All dimensions must be greater than zero.');
    });

    it('fills defaults', () => {
      const product = createProduct(input);
      expect(product).toMatchObject({
        description: '',
        unitCost: 0,
        isFragile: false,
        isHazmat: false,
        requiresRefrigeration: false,
      });
      expect(product.expirationDate).toBeUndefined();
    });

    it('validates weight and cost', () => {
      expect(() => createProduct({ ...input, weight: 0 })).toThrow('Weight must be greater than zero.');
      expect(() => createProduct({ ...input, unitCost: -1 })).toThrow('Unit cost cannot be negative.');
    });
  });

  describe('createInventory', () => {
    const input = {
      id: 'INV-1',
      sku: 'SKU-1',
      clientId: 'C-1',
      locationId: 'LOC-1',
      quantity: 5,
      reorderPoint: 10,
      maxQuantity: 100,
      lastCountDate: START,
    };

    it('defaults to Available', () => {
      expect(createInventory(input).status).toBe('Available');
    });

    it('validates quantities', () => {
      expect(() => createInventory({ ...input, quantity: -1 })).toThrow('Quantity cannot be negative.');
      expect(() => createInventory({ ...input, reorderPoint: -1 })).toThrow(
        'Reorder point cannot be negative.',
      );
      expect(() => createInventory({ ...input, maxQuantity: 9 })).toThrow(
        'Max quantity must be greater than or equal to reorder point.',
      );
      expect(createInventory({ ...input, maxQuantity: 10 }).maxQuantity).toBe(10);
    });
  });

  describe('createLocation', () => {
    it('defaults the weight limit and flags', () => {
      const location = createLocation({
        id: 'LOC-1',
        zone: 'A',
        aisle: '01',
        bay: '01',
        level: '1',
        type: 'Storage',
      });

      expect(location).toMatchObject({
        maxWeight: 5000,
        isTemperatureControlled: false,
        isHazmatApproved: false,
      });
    });
  });

  describe('createOrder', () => {
    const input = {
      id: 'ORD-1',
      clientId: 'C-1',
      orderDate: START,
      requiredDate: LATER,
      priority: 'Normal' as const,
      shippingMethod: 'Ground' as const,
      destinationCountry: 'USA',
      status: 'Pending' as const,
      lines: [createOrderLine('SKU-1', 3)],
    };

    it('defaults picked quantity to zero', () => {
      expect(createOrderLine('SKU-1', 3)).toEqual({ sku: 'SKU-1', quantityOrdered: 3, quantityPicked: 0 });
    });

    it('validates line quantities', () => {
      expect(() => createOrderLine('SKU-1', 0)).toThrow('Quantity ordered must be greater than zero.');
      expect(() => createOrderLine('SKU-1', 2, -1)).toThrow('Quantity picked cannot be negative.');
      expect(() => createOrderLine('SKU-1', 2, 3)).toThrow('Quantity picked cannot exceed quantity ordered.');
    });

    it('requires at least one line', () => {
      expect(() => createOrder({ ...input, lines: [] })).toThrow('Order must have at least one line item.');
    });

    it('allows the required date to equal the order date', () => {
      expect(createOrder({ ...input, requiredDate: START }).requiredDate).toEqual(START);
      expect(() => createOrder({ ...input, orderDate: LATER, requiredDate: START })).toThrow(
        'Required date must be on or after order date.',
      );
    });

    it('keeps its own copy of the dates', () => {
      const orderDate = new Date('2024-03-01T00:00:00Z');
      const order = createOrder({ ...input, orderDate });

      orderDate.setUTCFullYear(2031);

      expect(order.orderDate.toISOString()).toBe('2024-03-01T00:00:00.000Z');
      expect(order.requiredDate.getTime()).toBeGreaterThanOrEqual(order.orderDate.getTime());
    });

    it('copies the line list', () => {
      const lines = [createOrderLine('SKU-1', 1)];
      const order = createOrder({ ...input, lines });
      lines.push(createOrderLine('SKU-2', 1));

      expect(order.lines).toHaveLength(1);
    });
  });

  describe('createShipment', () => {
    const input = {
      id: 'S-1',
      orderId: 'ORD-1',
      clientId: 'C-1',
      shipDate: LATER,
      carrier: 'UPS',
      trackingNumber: 'TRK-1',
      weight: 4,
    };

    it('defaults to Created', () => {
      expect(createShipment(input).status).toBe('Created');
    });

    it('rejects a delivery before shipping', () => {
      expect(() => createShipment({ ...input, deliveryDate: START })).toThrow(
        'Delivery date cannot be before ship date.',
      );
    });

    it('keeps its own copy of the dates', () => {
      const shipDate = new Date('2024-06-10T00:00:00Z');
      const deliveryDate = new Date('2024-06-12T00:00:00Z');
      const created = createShipment({ ...input, shipDate, deliveryDate });

      shipDate.setUTCFullYear(2030);

      expect(created.shipDate.toISOString()).toBe('2024-06-10T00:00:00.000Z');
      expect(created.shipDate).not.toBe(shipDate);
      expect(created.deliveryDate?.getTime()).toBeGreaterThanOrEqual(created.shipDate.getTime());
    });

    it('rejects a missing carrier', () => {
      const carrier = undefined as unknown as string;
      expect(() => createShipment({ ...input, carrier })).toThrowErrorType(ArgumentNullException);
    });
  });
});
