/**
 * Rules over customer orders: priority, timing, destination and picking.
 */

import {
  Clock,
  ExpressionSpecification,
  Guard,
  SpecificationBase,
  SpecificationExpression,
  expressionsFor,
  hoursBetween,
  isSameUtcDay,
  systemClock,
} from '../../../src';
import {
  ORDER_PRIORITIES,
  ORDER_STATUSES,
  Order,
  OrderPriority,
  OrderStatus,
  SHIPPING_METHODS,
  ShippingMethod,
} from '../models/Order';
import { requireOneOf } from '../models/common';

const e = expressionsFor<Order>();

export const URGENT_PRIORITIES: readonly OrderPriority[] = ['Rush', 'SameDay'];
export const EXPEDITED_SHIPPING_METHODS: readonly ShippingMethod[] = ['Overnight', 'TwoDayAir'];
export const CLOSED_ORDER_STATUSES: readonly OrderStatus[] = ['Shipped', 'Delivered', 'Cancelled'];
export const EXPEDITE_WITHIN_HOURS = 8;

export class BelongsToClientSpecification extends ExpressionSpecification<Order> {
  readonly clientId: string;

  constructor(clientId: string) {
    super();
    this.clientId = Guard.againstBlank(clientId, 'clientId');
  }

  toExpression(): SpecificationExpression<Order> {
    return e.eq('clientId', this.clientId);
  }
}

export class HasPrioritySpecification extends ExpressionSpecification<Order> {
  readonly priority: OrderPriority;

  constructor(priority: OrderPriority) {
    super();
    this.priority = requireOneOf(ORDER_PRIORITIES, priority, 'priority');
  }

  toExpression(): SpecificationExpression<Order> {
    return e.eq('priority', this.priority);
  }
}

/**
 * Rush or same-day priority.
 */
export class IsUrgentSpecification extends ExpressionSpecification<Order> {
  toExpression(): SpecificationExpression<Order> {
    return e.in('priority', URGENT_PRIORITIES);
  }
}

export class HasStatusSpecification extends ExpressionSpecification<Order> {
  readonly status: OrderStatus;

  constructor(status: OrderStatus) {
    super();
    this.status = requireOneOf(ORDER_STATUSES, status, 'status');
  }

  toExpression(): SpecificationExpression<Order> {
    return e.eq('status', this.status);
  }
}

/**
 * Past its required date and not yet shipped, delivered or cancelled.
 */
export class IsOverdueSpecification extends SpecificationBase<Order> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(order: Order): boolean {
    return (
      order.requiredDate.getTime() < this.clock().getTime() &&
      !CLOSED_ORDER_STATUSES.includes(order.status)
    );
  }
}

/**
 * Required within the next `hours` hours (and not already past due).
 */
export class IsDueSoonSpecification extends SpecificationBase<Order> {
  readonly hours: number;

  constructor(
    hours: number = 24,
    private readonly clock: Clock = systemClock,
  ) {
    super();
    this.hours = Guard.againstNegative(hours, 'hours', 'Hours until due must be non-negative.');
  }

  isSatisfiedBy(order: Order): boolean {
    const remaining = hoursBetween(this.clock(), order.requiredDate);
    return remaining > 0 && remaining <= this.hours;
  }
}

/**
 * Destination differs from the domestic country (case-insensitive).
 */
export class IsInternationalSpecification extends SpecificationBase<Order> {
  readonly domesticCountry: string;

  constructor(domesticCountry: string = 'USA') {
    super();
    this.domesticCountry = Guard.againstBlank(domesticCountry, 'domesticCountry');
  }

  isSatisfiedBy(order: Order): boolean {
    return order.destinationCountry.toLowerCase() !== this.domesticCountry.toLowerCase();
  }
}

export class HasShippingMethodSpecification extends ExpressionSpecification<Order> {
  readonly shippingMethod: ShippingMethod;

  constructor(shippingMethod: ShippingMethod) {
    super();
    this.shippingMethod = requireOneOf(SHIPPING_METHODS, shippingMethod, 'shippingMethod');
  }

  toExpression(): SpecificationExpression<Order> {
    return e.eq('shippingMethod', this.shippingMethod);
  }
}

export class IsReadyToShipSpecification extends ExpressionSpecification<Order> {
  toExpression(): SpecificationExpression<Order> {
    return e.eq('status', 'Packed');
  }
}

export class IsCompletelyPickedSpecification extends SpecificationBase<Order> {
  isSatisfiedBy(order: Order): boolean {
    return order.lines.every((line) => line.quantityPicked >= line.quantityOrdered);
  }
}

/**
 * At least one line has been started but not finished.
 */
export class HasPartialPicksSpecification extends SpecificationBase<Order> {
  isSatisfiedBy(order: Order): boolean {
    return order.lines.some(
      (line) => line.quantityPicked > 0 && line.quantityPicked < line.quantityOrdered,
    );
  }
}

/**
 * More than `lineThreshold` lines.
 */
export class IsLargeOrderSpecification extends SpecificationBase<Order> {
  readonly lineThreshold: number;

  constructor(lineThreshold: number = 10) {
    super();
    this.lineThreshold = Guard.againstNonPositive(
      lineThreshold,
      'lineThreshold',
      'Line item threshold must be positive.',
    );
  }

  isSatisfiedBy(order: Order): boolean {
    return order.lines.length > this.lineThreshold;
  }
}

/**
 * Urgent priority, an expedited shipping method, or due within eight hours
 * (overdue orders included).
 */
export class RequiresExpeditedProcessingSpecification extends SpecificationBase<Order> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(order: Order): boolean {
    return (
      URGENT_PRIORITIES.includes(order.priority) ||
      EXPEDITED_SHIPPING_METHODS.includes(order.shippingMethod) ||
      hoursBetween(this.clock(), order.requiredDate) < EXPEDITE_WITHIN_HOURS
    );
  }
}

export class IsPlacedTodaySpecification extends SpecificationBase<Order> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(order: Order): boolean {
    return isSameUtcDay(order.orderDate, this.clock());
  }
}
