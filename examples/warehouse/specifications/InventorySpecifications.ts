/**
 * Rules over stock records: levels, status, quarantine and counting.
 */

import {
  Clock,
  ExpressionSpecification,
  Guard,
  SpecificationBase,
  SpecificationExpression,
  expressionsFor,
  systemClock,
  wholeDaysBetween,
} from '../../../src';
import { INVENTORY_STATUSES, Inventory, InventoryStatus } from '../models/Inventory';
import { requireOneOf } from '../models/common';

const e = expressionsFor<Inventory>();

export class BelongsToClientSpecification extends ExpressionSpecification<Inventory> {
  readonly clientId: string;

  constructor(clientId: string) {
    super();
    this.clientId = Guard.againstBlank(clientId, 'clientId');
  }

  toExpression(): SpecificationExpression<Inventory> {
    return e.eq('clientId', this.clientId);
  }
}

/**
 * Available stock at or below its reorder point.
 */
export class IsBelowReorderPointSpecification extends SpecificationBase<Inventory> {
  isSatisfiedBy(item: Inventory): boolean {
    return item.quantity <= item.reorderPoint && item.status === 'Available';
  }
}

export class IsOutOfStockSpecification extends ExpressionSpecification<Inventory> {
  toExpression(): SpecificationExpression<Inventory> {
    return e.eq('quantity', 0);
  }
}

/**
 * Quantity is at least `threshold` (a fraction in [0, 1]) of the maximum.
 * Records with a maximum of zero never qualify.
 */
export class IsNearCapacitySpecification extends SpecificationBase<Inventory> {
  readonly threshold: number;

  constructor(threshold: number = 0.9) {
    super();
    this.threshold = Guard.againstOutOfRange(
      threshold,
      0,
      1,
      'threshold',
      'Threshold percentage must be between 0 and 1.',
    );
  }

  isSatisfiedBy(item: Inventory): boolean {
    if (item.maxQuantity === 0) {
      return false;
    }
    return item.quantity / item.maxQuantity >= this.threshold;
  }
}

export class HasStatusSpecification extends ExpressionSpecification<Inventory> {
  readonly status: InventoryStatus;

  constructor(status: InventoryStatus) {
    super();
    this.status = requireOneOf(INVENTORY_STATUSES, status, 'status');
  }

  toExpression(): SpecificationExpression<Inventory> {
    return e.eq('status', this.status);
  }
}

/**
 * Quarantined and still inside the quarantine window.
 */
export class IsInQuarantineSpecification extends SpecificationBase<Inventory> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(item: Inventory): boolean {
    return (
      item.status === 'Quarantine' &&
      item.quarantineUntil !== undefined &&
      item.quarantineUntil.getTime() > this.clock().getTime()
    );
  }
}

/**
 * Quarantined with a window that has ended.
 */
export class CanReleaseFromQuarantineSpecification extends SpecificationBase<Inventory> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(item: Inventory): boolean {
    return (
      item.status === 'Quarantine' &&
      item.quarantineUntil !== undefined &&
      item.quarantineUntil.getTime() <= this.clock().getTime()
    );
  }
}

/**
 * Last counted more than `days` whole days ago.
 */
export class NeedsCycleCountSpecification extends SpecificationBase<Inventory> {
  readonly days: number;

  constructor(
    days: number = 30,
    private readonly clock: Clock = systemClock,
  ) {
    super();
    this.days = Guard.againstNegative(days, 'days', 'Days since last count must be non-negative.');
  }

  isSatisfiedBy(item: Inventory): boolean {
    return wholeDaysBetween(item.lastCountDate, this.clock()) > this.days;
  }
}

export class IsAvailableSpecification extends ExpressionSpecification<Inventory> {
  toExpression(): SpecificationExpression<Inventory> {
    return e.and(e.eq('status', 'Available'), e.gt('quantity', 0));
  }
}

export class IsAtLocationSpecification extends ExpressionSpecification<Inventory> {
  readonly locationId: string;

  constructor(locationId: string) {
    super();
    this.locationId = Guard.againstBlank(locationId, 'locationId');
  }

  toExpression(): SpecificationExpression<Inventory> {
    return e.eq('locationId', this.locationId);
  }
}

/**
 * Damaged or expired stock, or an available slot that has run empty.
 */
export class RequiresImmediateAttentionSpecification extends ExpressionSpecification<Inventory> {
  toExpression(): SpecificationExpression<Inventory> {
    return e.or(
      e.in('status', ['Damaged', 'Expired']),
      e.and(e.eq('quantity', 0), e.eq('status', 'Available')),
    );
  }
}
