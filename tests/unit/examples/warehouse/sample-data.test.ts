/**
 * @fileoverview Unit tests for loading the warehouse fixture
 */

import { ArgumentException, fixedClock } from '../../../../src';
import { loadSampleData, parseWarehouseData } from '../../../../examples/warehouse/data/sampleData';

const NOW = new Date('2024-06-15T12:00:00Z');

describe('Warehouse sample data', () => {
  const data = loadSampleData(fixedClock(NOW));

  it('loads every collection', () => {
    expect(data.clients).toHaveLength(5);
    expect(data.products).toHaveLength(7);
    expect(data.inventory).toHaveLength(7);
    expect(data.locations).toHaveLength(6);
    expect(data.orders).toHaveLength(7);
    expect(data.shipments).toHaveLength(6);
  });

  it('resolves date offsets against the clock', () => {
    const rush = data.orders[0];

    expect(rush.id).toBe('ORD-001');
    expect(rush.orderDate.toISOString()).toBe('2024-06-14T12:00:00.000Z');
    expect(rush.requiredDate.toISOString()).toBe('2024-06-15T18:00:00.000Z');
  });

  it('applies defaults for omitted fields', () => {
    const tires = data.products[0];
    const firstLine = data.orders[0].lines[0];

    expect(tires).toMatchObject({ sku: 'AUTO-TIRE-01', isFragile: false, isHazmat: false });
    expect(tires.expirationDate).toBeUndefined();
    expect(data.inventory[0].status).toBe('Available');
    expect(data.locations[0].isTemperatureControlled).toBe(false);
    expect(firstLine.quantityPicked).toBe(0);
  });

  it('keeps optional dates when present', () => {
    const quarantined = data.inventory[6];

    expect(quarantined.status).toBe('Quarantine');
    expect(quarantined.quarantineUntil?.toISOString()).toBe('2024-06-18T12:00:00.000Z');
  });

  describe('parseWarehouseData', () => {
    it('requires an object root', () => {
      expect(() => parseWarehouseData(null, NOW)).toThrow('data must be an object.');
      expect(() => parseWarehouseData([], NOW)).toThrowErrorType(ArgumentException);
    });

    it('requires arrays for collections', () => {
      expect(() => parseWarehouseData({ clients: 'none' }, NOW)).toThrow('data.clients must be an array.');
    });

    it('names the path of a missing field', () => {
      expect(() => parseWarehouseData({ clients: [{ id: 'C-1' }] }, NOW)).toThrow(
        'data.clients[0].name must be a string.',
      );
    });

    it('treats omitted collections as empty', () => {
      expect(parseWarehouseData({}, NOW)).toEqual({
        clients: [],
        products: [],
        inventory: [],
        locations: [],
        orders: [],
        shipments: [],
      });
    });

    it('names the path into nested lists', () => {
      const raw = {
        orders: [
          {
            id: 'ORD-1',
            clientId: 'C-1',
            orderDate: { days: -1 },
            requiredDate: { days: 1 },
            priority: 'Normal',
            shippingMethod: 'Ground',
            destinationCountry: 'USA',
            status: 'Pending',
            lines: [{ quantityOrdered: 2 }],
          },
        ],
      };

      expect(() => parseWarehouseData(raw, NOW)).toThrow('data.orders[0].lines[0].sku must be a string.');
    });

    it('names the accepted literals', () => {
      const raw = {
        clients: [{ id: 'C-1', name: 'Test', contactEmail: 'ops@example.com', tier: 'Gold' }],
      };

      expect(() => parseWarehouseData(raw, NOW)).toThrow(
        'data.clients[0].tier must be one of Standard, Premium, Enterprise.',
      );
    });

    it('requires date offsets to be objects', () => {
      const raw = {
        clients: [
          {
            id: 'C-1',
            name: 'Test',
            contactEmail: 'ops@example.com',
            tier: 'Standard',
            contractStart: 'yesterday',
          },
        ],
      };

      expect(() => parseWarehouseData(raw, NOW)).toThrow('data.clients[0].contractStart must be an object.');
    });

    it('passes domain validation errors through', () => {
      const raw = {
        clients: [
          {
            id: 'C-1',
            name: 'Test',
            contactEmail: 'ops@example.com',
            tier: 'Standard',
            contractStart: { days: 0 },
            contractEnd: { days: -1 },
          },
        ],
      };

      expect(() => parseWarehouseData(raw, NOW)).toThrow('Contract end date must be after start date.');
    });
  });
});
