/**
 * Warehouse walkthroughs: each scenario combines entity specifications into
 * an operational rule, applies it to the sample data, logs a short report and
 * returns the report's data.
 */

import {
  Clock,
  ILogger,
  ISpecification,
  Specifications,
  firstOrDefault,
  formatExpression,
  hoursBetween,
  query,
  translateToExpression,
  wholeDaysBetween,
} from '../../src';
import type { Scenario } from '../scenario';
import type { WarehouseData } from './data/sampleData';
import type { Client, ClientTier } from './models/Client';
import type { Inventory } from './models/Inventory';
import type { Location } from './models/Location';
import type { OrderPriority, OrderStatus, ShippingMethod } from './models/Order';
import type { Product } from './models/Product';
import { SHIPMENT_STATUSES, ShipmentStatus } from './models/Shipment';
import {
  ClientSpecifications,
  InventorySpecifications,
  OrderSpecifications,
  ProductSpecifications,
  ShipmentSpecifications,
} from './specifications';

export interface WarehouseContext {
  readonly data: WarehouseData;
  readonly clock: Clock;
  /** Country whose orders count as domestic */
  readonly domesticCountry: string;
}

const findClient = (data: WarehouseData, id: string): Client | undefined =>
  firstOrDefault(data.clients, Specifications.where<Client>((c) => c.id === id));

const findProduct = (data: WarehouseData, sku: string): Product | undefined =>
  firstOrDefault(data.products, Specifications.where<Product>((p) => p.sku === sku));

const stockOf = (data: WarehouseData, sku: string): Inventory | undefined =>
  firstOrDefault(
    data.inventory,
    Specifications.where<Inventory>((i) => i.sku === sku && i.quantity > 0),
  );

// ==================== 1. Low stock for premium clients ====================

export interface LowStockClientReport {
  clientId: string;
  clientName: string;
  tier: ClientTier;
  items: { inventoryId: string; sku: string; quantity: number; reorderPoint: number }[];
}

export function lowStockPremiumClients(context: WarehouseContext, logger: ILogger): LowStockClientReport[] {
  logger.info('=== Warehouse 1: Low Stock Alert for Premium Clients ===');

  const { data } = context;
  const premiumActive = new ClientSpecifications.IsPremiumOrEnterpriseSpecification().and(
    new ClientSpecifications.IsActiveSpecification(),
  );
  const lowStock = new InventorySpecifications.IsBelowReorderPointSpecification().or(
    new InventorySpecifications.IsOutOfStockSpecification(),
  );

  const report: LowStockClientReport[] = [];
  for (const client of query(data.clients).where(premiumActive)) {
    const items = query(data.inventory)
      .where(lowStock.and(new InventorySpecifications.BelongsToClientSpecification(client.id)))
      .toArray();
    if (items.length === 0) {
      continue;
    }

    logger.info(`Client: ${client.name} (Tier: ${client.tier})`);
    items.forEach((item) =>
      logger.info(`  - SKU: ${item.sku}, Qty: ${item.quantity}, Reorder Point: ${item.reorderPoint}`),
    );

    report.push({
      clientId: client.id,
      clientName: client.name,
      tier: client.tier,
      items: items.map(({ id, sku, quantity, reorderPoint }) => ({
        inventoryId: id,
        sku,
        quantity,
        reorderPoint,
      })),
    });
  }

  return report;
}

// ==================== 2. Expedited orders ====================

export interface ExpeditedOrderReport {
  orderId: string;
  priority: OrderPriority;
  shippingMethod: ShippingMethod;
  hoursRemaining: number;
  lineCount: number;
}

export function expeditedOrders(context: WarehouseContext, logger: ILogger): ExpeditedOrderReport[] {
  logger.info('=== Warehouse 2: Expedited Order Processing ===');

  const { data, clock } = context;
  const urgentPending = new OrderSpecifications.RequiresExpeditedProcessingSpecification(clock).and(
    new OrderSpecifications.HasStatusSpecification('Pending'),
  );

  const now = clock();
  const report = query(data.orders)
    .where(urgentPending)
    .toArray()
    .sort((a, b) => a.requiredDate.getTime() - b.requiredDate.getTime())
    .map((order) => ({
      orderId: order.id,
      priority: order.priority,
      shippingMethod: order.shippingMethod,
      hoursRemaining: hoursBetween(now, order.requiredDate),
      lineCount: order.lines.length,
    }));

  logger.info(`Urgent pending orders requiring immediate processing (${report.length}):`);
  report.forEach((o) => {
    logger.info(`  Order: ${o.orderId}`);
    logger.info(`    Priority: ${o.priority}, Shipping: ${o.shippingMethod}`);
    logger.info(`    Due in ${o.hoursRemaining.toFixed(1)} hours, Lines: ${o.lineCount}`);
  });

  return report;
}

// ==================== 3. Special handling locations ====================

export interface SpecialHandlingReport {
  sku: string;
  name: string;
  attributes: string[];
  suitableLocationIds: string[];
}

/**
 * Storage locations that can physically and legally hold `product`.
 */
export function suitableLocationFor(product: Product): ISpecification<Location> {
  let rule = Specifications.and(
    Specifications.where<Location>((l) => l.type === 'Storage'),
    Specifications.where<Location>((l) => product.weight <= l.maxWeight),
  );
  if (product.isHazmat) {
    rule = rule.and(Specifications.where<Location>((l) => l.isHazmatApproved));
  }
  if (product.requiresRefrigeration) {
    rule = rule.and(Specifications.where<Location>((l) => l.isTemperatureControlled));
  }
  return rule;
}

export function specialHandlingLocations(context: WarehouseContext, logger: ILogger): SpecialHandlingReport[] {
  logger.info('=== Warehouse 3: Special Handling Location Assignment ===');

  const { data } = context;
  const special = query(data.products)
    .where(new ProductSpecifications.RequiresSpecialHandlingSpecification())
    .toArray();

  logger.info(`Products requiring special handling (${special.length}):`);

  return special.map((product) => {
    const attributes = [
      product.isHazmat ? 'Hazmat' : undefined,
      product.isFragile ? 'Fragile' : undefined,
      product.requiresRefrigeration ? 'Refrigerated' : undefined,
    ].filter((attribute): attribute is string => attribute !== undefined);
    const locations = query(data.locations).where(suitableLocationFor(product)).toArray();

    logger.info(`  SKU: ${product.sku} - ${product.name}`);
    logger.info(`    Attributes: ${attributes.join(', ')}`);
    logger.info(`    Suitable locations: ${locations.length}`);
    locations
      .slice(0, 3)
      .forEach((l) => logger.info(`      - ${l.id} (${l.zone}-${l.aisle}-${l.bay}-${l.level})`));

    return {
      sku: product.sku,
      name: product.name,
      attributes,
      suitableLocationIds: locations.map((l) => l.id),
    };
  });
}

// ==================== 4. Expiring inventory ====================

export interface ExpiringItem {
  sku: string;
  quantity: number;
  daysRemaining: number;
}

export interface ExpiringInventoryReport {
  /** Already expired */
  critical: ExpiringItem[];
  /** Within 7 days */
  high: ExpiringItem[];
  /** Within 30 days, but not 7 */
  medium: ExpiringItem[];
}

export function expiringInventory(context: WarehouseContext, logger: ILogger): ExpiringInventoryReport {
  logger.info('=== Warehouse 4: Expiring Inventory Management ===');

  const { data, clock } = context;
  const now = clock();
  const expiring30 = new ProductSpecifications.IsExpiringSpecification(30, clock);
  const expiring7 = new ProductSpecifications.IsExpiringSpecification(7, clock);
  const expired = new ProductSpecifications.IsExpiredSpecification(clock);

  const inStock = (spec: ISpecification<Product>): ExpiringItem[] =>
    query(data.products)
      .where(spec)
      .toArray()
      .flatMap((product) => {
        const stock = stockOf(data, product.sku);
        if (!stock || !product.expirationDate) {
          return [];
        }
        return [
          {
            sku: product.sku,
            quantity: stock.quantity,
            daysRemaining: wholeDaysBetween(now, product.expirationDate),
          },
        ];
      });

  const report: ExpiringInventoryReport = {
    critical: inStock(expired),
    high: inStock(expiring7.andNot(expired)),
    medium: inStock(expiring30.andNot(expiring7)),
  };

  logger.info(`CRITICAL - Expired (${report.critical.length}):`);
  report.critical.forEach((i) => logger.info(`  ✗ ${i.sku} - Qty: ${i.quantity}`));
  logger.info(`HIGH - Expiring within 7 days (${report.high.length}):`);
  report.high.forEach((i) => logger.info(`  ! ${i.sku} - Qty: ${i.quantity}, Days left: ${i.daysRemaining}`));
  logger.info(`MEDIUM - Expiring within 30 days (${report.medium.length}):`);
  report.medium.forEach((i) => logger.info(`  • ${i.sku} - Qty: ${i.quantity}, Days left: ${i.daysRemaining}`));

  return report;
}

// ==================== 5. Order batching ====================

export interface OrderBatch {
  clientId: string;
  orderIds: string[];
  totalLines: number;
}

export interface OrderBatchingReport {
  /** The batching rule rendered as an expression */
  rule: string;
  batches: OrderBatch[];
}

export function orderBatching(context: WarehouseContext, logger: ILogger): OrderBatchingReport {
  logger.info('=== Warehouse 5: Order Batching Logic ===');

  const batchable = new OrderSpecifications.HasStatusSpecification('Pending')
    .and(new OrderSpecifications.HasShippingMethodSpecification('Ground'))
    .andNot(new OrderSpecifications.IsUrgentSpecification());
  const rule = formatExpression(translateToExpression(batchable));

  const batches = new Map<string, OrderBatch>();
  for (const order of query(context.data.orders).where(batchable)) {
    const batch = batches.get(order.clientId) ?? { clientId: order.clientId, orderIds: [], totalLines: 0 };
    batch.orderIds.push(order.id);
    batch.totalLines += order.lines.length;
    batches.set(order.clientId, batch);
  }

  logger.info(`Rule: ${rule}`);
  batches.forEach((batch) => {
    logger.info(`  Client: ${batch.clientId}`);
    logger.info(`    Orders in batch: ${batch.orderIds.length}`);
    logger.info(`    Total line items: ${batch.totalLines}`);
    logger.info(`    Order IDs: ${batch.orderIds.join(', ')}`);
  });

  return { rule, batches: [...batches.values()] };
}

// ==================== 6. SLA monitoring ====================

export interface ShipmentIssueReport {
  shipmentId: string;
  clientName: string;
  tier?: ClientTier;
  status: ShipmentStatus;
  carrier: string;
  trackingNumber: string;
  priority: 'HIGH' | 'NORMAL';
}

export function slaMonitoring(context: WarehouseContext, logger: ILogger): ShipmentIssueReport[] {
  logger.info('=== Warehouse 6: SLA Compliance Monitoring ===');

  const { data } = context;
  const isPremium = new ClientSpecifications.IsPremiumOrEnterpriseSpecification();
  const statusRank = (status: ShipmentStatus) => SHIPMENT_STATUSES.indexOf(status);

  const report = query(data.shipments)
    .where(new ShipmentSpecifications.HasDeliveryIssuesSpecification())
    .toArray()
    .sort((a, b) => statusRank(a.status) - statusRank(b.status))
    .map((shipment): ShipmentIssueReport => {
      const client = findClient(data, shipment.clientId);
      return {
        shipmentId: shipment.id,
        clientName: client?.name ?? shipment.clientId,
        tier: client?.tier,
        status: shipment.status,
        carrier: shipment.carrier,
        trackingNumber: shipment.trackingNumber,
        priority: client && isPremium.isSatisfiedBy(client) ? 'HIGH' : 'NORMAL',
      };
    });

  logger.info(`Shipments with delivery issues (${report.length}):`);
  report.forEach((s) => {
    logger.info(`  Shipment: ${s.shipmentId} [Priority: ${s.priority}]`);
    logger.info(`    Client: ${s.clientName} (${s.tier ?? 'unknown'})`);
    logger.info(`    Status: ${s.status}, Carrier: ${s.carrier}, Tracking: ${s.trackingNumber}`);
  });

  return report;
}

// ==================== 7. Cycle counts ====================

export interface CycleCountTask {
  rank: number;
  inventoryId: string;
  sku: string;
  clientName: string;
  tier?: ClientTier;
  unitCost: number;
  quantity: number;
  daysSinceCount: number;
  locationId: string;
}

const TIER_WEIGHT: Record<ClientTier, number> = { Enterprise: 3, Premium: 2, Standard: 1 };

export const MAX_CYCLE_COUNT_TASKS = 10;

export function cycleCountPriorities(context: WarehouseContext, logger: ILogger): CycleCountTask[] {
  logger.info('=== Warehouse 7: Cycle Count Prioritization ===');

  const { data, clock } = context;
  const now = clock();
  const due = new InventorySpecifications.NeedsCycleCountSpecification(30, clock).and(
    new InventorySpecifications.IsAvailableSpecification(),
  );

  const tasks = query(data.inventory)
    .where(due)
    .toArray()
    .map((item) => {
      const client = findClient(data, item.clientId);
      return {
        item,
        client,
        unitCost: findProduct(data, item.sku)?.unitCost ?? 0,
        daysSinceCount: wholeDaysBetween(item.lastCountDate, now),
        tierWeight: client ? TIER_WEIGHT[client.tier] : TIER_WEIGHT.Standard,
      };
    })
    .sort(
      (a, b) =>
        b.tierWeight - a.tierWeight ||
        b.unitCost - a.unitCost ||
        b.daysSinceCount - a.daysSinceCount,
    )
    .slice(0, MAX_CYCLE_COUNT_TASKS)
    .map(
      ({ item, client, unitCost, daysSinceCount }, i): CycleCountTask => ({
        rank: i + 1,
        inventoryId: item.id,
        sku: item.sku,
        clientName: client?.name ?? item.clientId,
        tier: client?.tier,
        unitCost,
        quantity: item.quantity,
        daysSinceCount,
        locationId: item.locationId,
      }),
    );

  logger.info(`Inventory items requiring cycle count (${tasks.length}):`);
  tasks.forEach((t) => {
    logger.info(`  ${t.rank}. SKU: ${t.sku}`);
    logger.info(`     Client: ${t.clientName} (${t.tier ?? 'unknown'})`);
    logger.info(`     Value: $${t.unitCost.toFixed(2)}, Qty: ${t.quantity}`);
    logger.info(`     Days since count: ${t.daysSinceCount}, Location: ${t.locationId}`);
  });

  return tasks;
}

// ==================== 8. International compliance ====================

export interface InternationalOrderReport {
  orderId: string;
  destination: string;
  status: OrderStatus;
  readyToShip: boolean;
  hasHazmat: boolean;
  hasPerishable: boolean;
}

export function internationalCompliance(
  context: WarehouseContext,
  logger: ILogger,
): InternationalOrderReport[] {
  logger.info('=== Warehouse 8: International Shipment Compliance ===');

  const { data, domesticCountry } = context;
  const isReadyToShip = new OrderSpecifications.IsReadyToShipSpecification();
  const isHazmat = new ProductSpecifications.IsHazmatSpecification();
  const isPerishable = new ProductSpecifications.IsPerishableSpecification();

  const report = query(data.orders)
    .where(new OrderSpecifications.IsInternationalSpecification(domesticCountry))
    .toArray()
    .map((order) => {
      const products = order.lines.flatMap((line) => {
        const product = findProduct(data, line.sku);
        return product ? [product] : [];
      });
      return {
        orderId: order.id,
        destination: order.destinationCountry,
        status: order.status,
        readyToShip: isReadyToShip.isSatisfiedBy(order),
        hasHazmat: query(products).any(isHazmat),
        hasPerishable: query(products).any(isPerishable),
      };
    });

  logger.info(`International orders (${report.length}):`);
  report.forEach((o) => {
    logger.info(`  Order: ${o.orderId} → ${o.destination} (${o.status})`);
    if (!o.hasHazmat && !o.hasPerishable) {
      logger.info('    ✓ No compliance issues');
      return;
    }
    logger.info('    ⚠ COMPLIANCE ISSUES:');
    if (o.hasHazmat) logger.info('      - Contains HAZMAT items (special documentation required)');
    if (o.hasPerishable) logger.info('      - Contains perishable items (expedited shipping required)');
  });

  return report;
}

/**
 * Menu entries for the warehouse scenarios, bound to `context`.
 */
export function createWarehouseScenarios(context: WarehouseContext): Scenario[] {
  const bind =
    <R>(run: (ctx: WarehouseContext, logger: ILogger) => R) =>
    (logger: ILogger): R =>
      run(context, logger);

  return [
    { key: '1', title: 'Low Stock Alert for Premium Clients', run: bind(lowStockPremiumClients) },
    { key: '2', title: 'Expedited Order Processing', run: bind(expeditedOrders) },
    { key: '3', title: 'Special Handling Location Assignment', run: bind(specialHandlingLocations) },
    { key: '4', title: 'Expiring Inventory Management', run: bind(expiringInventory) },
    { key: '5', title: 'Order Batching Logic', run: bind(orderBatching) },
    { key: '6', title: 'SLA Compliance Monitoring', run: bind(slaMonitoring) },
    { key: '7', title: 'Cycle Count Prioritization', run: bind(cycleCountPriorities) },
    { key: '8', title: 'International Shipment Compliance', run: bind(internationalCompliance) },
  ];
}
