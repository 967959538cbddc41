/**
 * @fileoverview Unit tests for the warehouse scenarios against the sample data
 */

import { ILogger, fixedClock, query } from '../../../../src';
import { loadSampleData } from '../../../../examples/warehouse/data/sampleData';
import { createProduct, createDimensions } from '../../../../examples/warehouse/models';
import {
  WarehouseContext,
  createWarehouseScenarios,
  cycleCountPriorities,
  expeditedOrders,
  expiringInventory,
  internationalCompliance,
  lowStockPremiumClients,
  orderBatching,
  slaMonitoring,
  specialHandlingLocations,
  suitableLocationFor,
} from '../../../../examples/warehouse/scenarios';

const NOW = new Date('2024-06-15T12:00:00Z');
const clock = fixedClock(NOW);

const context: WarehouseContext = {
  data: loadSampleData(clock),
  clock,
  domesticCountry: 'USA',
};

function createMockLogger(): ILogger & { [K in keyof ILogger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

const ALL_STORAGE = ['LOC-A1', 'LOC-B1', 'LOC-B2', 'LOC-C3', 'LOC-D4'];

describe('Warehouse scenarios', () => {
  it('registers eight scenarios', () => {
    const scenarios = createWarehouseScenarios(context);

    expect(scenarios.map((s) => s.key)).toEqual(['1', '2', '3', '4', '5', '6', '7', '8']);
    expect(scenarios[4].title).toBe('Order Batching Logic');
  });

  it('binds scenarios to the context', () => {
    const logger = createMockLogger();
    const [first] = createWarehouseScenarios(context);

    expect(first.run(logger)).toEqual(lowStockPremiumClients(context, createMockLogger()));
    expect(logger.info).toHaveBeenNthCalledWith(1, '=== Warehouse 1: Low Stock Alert for Premium Clients ===');
  });

  it('1. finds low stock for active premium and enterprise clients', () => {
    expect(lowStockPremiumClients(context, createMockLogger())).toEqual([
      {
        clientId: 'C-100',
        clientName: 'Northwind Auto Parts',
        tier: 'Enterprise',
        items: [
          { inventoryId: 'INV-001', sku: 'AUTO-TIRE-01', quantity: 45, reorderPoint: 100 },
          { inventoryId: 'INV-004', sku: 'AUTO-SEAL-01', quantity: 0, reorderPoint: 50 },
        ],
      },
      {
        clientId: 'C-300',
        clientName: 'Circuit Yard',
        tier: 'Enterprise',
        items: [{ inventoryId: 'INV-003', sku: 'ELEC-GPU-01', quantity: 8, reorderPoint: 10 }],
      },
    ]);
  });

  it('2. lists pending orders that need expediting, soonest first', () => {
    const logger = createMockLogger();

    expect(expeditedOrders(context, logger)).toEqual([
      { orderId: 'ORD-001', priority: 'Rush', shippingMethod: 'Overnight', hoursRemaining: 6, lineCount: 1 },
      { orderId: 'ORD-003', priority: 'High', shippingMethod: 'TwoDayAir', hoursRemaining: 24, lineCount: 1 },
    ]);
    expect(logger.info).toHaveBeenCalledWith('    Due in 6.0 hours, Lines: 1');
    expect(logger.info.mock.calls).toContainItemMatching<unknown[]>((call) => call[0] === '    Due in 24.0 hours, Lines: 1');
  });

  it('3. matches special-handling products to storage', () => {
    expect(specialHandlingLocations(context, createMockLogger())).toEqual([
      { sku: 'BEAU-LIP-01', name: 'Velvet Lipstick', attributes: ['Fragile'], suitableLocationIds: ALL_STORAGE },
      { sku: 'ELEC-GPU-01', name: 'Graphics Card', attributes: ['Fragile'], suitableLocationIds: ALL_STORAGE },
      { sku: 'AUTO-SEAL-01', name: 'Tire Sealant Spray', attributes: ['Hazmat'], suitableLocationIds: ['LOC-D4'] },
      { sku: 'BEAU-FND-01', name: 'Matte Foundation', attributes: ['Fragile'], suitableLocationIds: ALL_STORAGE },
      {
        sku: 'FOOD-CHZ-01',
        name: 'Aged Cheddar Wheel',
        attributes: ['Refrigerated'],
        suitableLocationIds: ['LOC-B1', 'LOC-B2'],
      },
      {
        sku: 'FOOD-YOG-01',
        name: 'Greek Yogurt Case',
        attributes: ['Refrigerated'],
        suitableLocationIds: ['LOC-B1', 'LOC-B2'],
      },
    ]);
  });

  it('suitableLocationFor respects the weight limit', () => {
    const anvil = createProduct({
      sku: 'IND-ANVIL-01',
      clientId: 'C-400',
      name: 'Anvil',
      category: 'Industrial',
      weight: 2500,
      dimensions: createDimensions(10, 10, 10),
    });

    expect(query(context.data.locations).where(suitableLocationFor(anvil)).toArray().map((l) => l.id)).toEqual([
      'LOC-A1',
      'LOC-D4',
    ]);
  });

  it('4. buckets stocked products by expiry', () => {
    expect(expiringInventory(context, createMockLogger())).toEqual({
      critical: [{ sku: 'FOOD-YOG-01', quantity: 12, daysRemaining: -2 }],
      high: [{ sku: 'FOOD-CHZ-01', quantity: 40, daysRemaining: 5 }],
      medium: [{ sku: 'BEAU-FND-01', quantity: 150, daysRemaining: 10 }],
    });
  });

  it('5. batches pending ground orders per client', () => {
    const logger = createMockLogger();

    expect(orderBatching(context, logger)).toEqual({
      rule: '((status = "Pending" AND shippingMethod = "Ground") AND NOT priority IN ("Rush", "SameDay"))',
      batches: [{ clientId: 'C-200', orderIds: ['ORD-002', 'ORD-004'], totalLines: 3 }],
    });
    expect(logger.info).toHaveBeenCalledWith('    Order IDs: ORD-002, ORD-004');
  });

  it('6. reports shipments with delivery issues by status', () => {
    expect(slaMonitoring(context, createMockLogger())).toEqual([
      {
        shipmentId: 'SHIP-002',
        clientName: 'Bluebell Cosmetics',
        tier: 'Premium',
        status: 'Delayed',
        carrier: 'UPS',
        trackingNumber: 'TRK-0002',
        priority: 'HIGH',
      },
      {
        shipmentId: 'SHIP-005',
        clientName: 'Harbor Foods',
        tier: 'Premium',
        status: 'Exception',
        carrier: 'FedEx',
        trackingNumber: 'TRK-0005',
        priority: 'HIGH',
      },
      {
        shipmentId: 'SHIP-004',
        clientName: 'Corner Goods',
        tier: 'Standard',
        status: 'Returned',
        carrier: 'DHL',
        trackingNumber: 'TRK-0004',
        priority: 'NORMAL',
      },
    ]);
  });

  it('7. ranks overdue cycle counts by tier, value and age', () => {
    expect(cycleCountPriorities(context, createMockLogger())).toEqual([
      {
        rank: 1,
        inventoryId: 'INV-001',
        sku: 'AUTO-TIRE-01',
        clientName: 'Northwind Auto Parts',
        tier: 'Enterprise',
        unitCost: 120,
        quantity: 45,
        daysSinceCount: 45,
        locationId: 'LOC-A1',
      },
      {
        rank: 2,
        inventoryId: 'INV-006',
        sku: 'FOOD-CHZ-01',
        clientName: 'Harbor Foods',
        tier: 'Premium',
        unitCost: 85,
        quantity: 40,
        daysSinceCount: 35,
        locationId: 'LOC-B1',
      },
    ]);
  });

  it('8. flags compliance issues on international orders', () => {
    expect(internationalCompliance(context, createMockLogger())).toEqual([
      {
        orderId: 'ORD-003',
        destination: 'Canada',
        status: 'Pending',
        readyToShip: false,
        hasHazmat: false,
        hasPerishable: false,
      },
      {
        orderId: 'ORD-005',
        destination: 'Mexico',
        status: 'Packed',
        readyToShip: true,
        hasHazmat: true,
        hasPerishable: false,
      },
      {
        orderId: 'ORD-007',
        destination: 'Germany',
        status: 'Packed',
        readyToShip: true,
        hasHazmat: false,
        hasPerishable: true,
      },
    ]);
  });

  it('8. uses the configured domestic country', () => {
    const canadian = internationalCompliance({ ...context, domesticCountry: 'Canada' }, createMockLogger());

    expect(canadian.map((o) => o.orderId)).toEqual(['ORD-001', 'ORD-002', 'ORD-004', 'ORD-005', 'ORD-006', 'ORD-007']);
  });
});
