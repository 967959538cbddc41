/**
 * Rules over outbound shipments: carrier, status and delivery timing.
 */

import {
  ArgumentException,
  Clock,
  ExpressionSpecification,
  Guard,
  SpecificationBase,
  SpecificationExpression,
  expressionsFor,
  isSameUtcDay,
  systemClock,
  wholeDaysBetween,
} from '../../../src';
import { SHIPMENT_STATUSES, Shipment, ShipmentStatus } from '../models/Shipment';
import { requireDate, requireOneOf } from '../models/common';

const e = expressionsFor<Shipment>();

export class BelongsToClientSpecification extends ExpressionSpecification<Shipment> {
  readonly clientId: string;

  constructor(clientId: string) {
    super();
    this.clientId = Guard.againstBlank(clientId, 'clientId');
  }

  toExpression(): SpecificationExpression<Shipment> {
    return e.eq('clientId', this.clientId);
  }
}

export class HasStatusSpecification extends ExpressionSpecification<Shipment> {
  readonly status: ShipmentStatus;

  constructor(status: ShipmentStatus) {
    super();
    this.status = requireOneOf(SHIPMENT_STATUSES, status, 'status');
  }

  toExpression(): SpecificationExpression<Shipment> {
    return e.eq('status', this.status);
  }
}

/**
 * Carrier name matches, ignoring case.
 */
export class IsCarrierSpecification extends SpecificationBase<Shipment> {
  readonly carrier: string;

  constructor(carrier: string) {
    super();
    this.carrier = Guard.againstBlank(carrier, 'carrier');
  }

  isSatisfiedBy(shipment: Shipment): boolean {
    return shipment.carrier.toLowerCase() === this.carrier.toLowerCase();
  }
}

export class IsDelayedSpecification extends ExpressionSpecification<Shipment> {
  toExpression(): SpecificationExpression<Shipment> {
    return e.in('status', ['Delayed', 'Exception']);
  }
}

export class IsInTransitSpecification extends ExpressionSpecification<Shipment> {
  toExpression(): SpecificationExpression<Shipment> {
    return e.in('status', ['InTransit', 'OutForDelivery']);
  }
}

/**
 * Delivered with a recorded delivery date.
 */
export class IsDeliveredSpecification extends ExpressionSpecification<Shipment> {
  toExpression(): SpecificationExpression<Shipment> {
    return e.and(e.eq('status', 'Delivered'), e.not(e.isNull('deliveryDate')));
  }
}

/**
 * Ship date within `[start, end]`, both ends inclusive.
 */
export class IsShippedInDateRangeSpecification extends ExpressionSpecification<Shipment> {
  readonly start: Date;
  readonly end: Date;

  constructor(start: Date, end: Date) {
    super();
    this.start = requireDate(start, 'start');
    this.end = requireDate(end, 'end');
    if (this.end.getTime() < this.start.getTime()) {
      throw new ArgumentException('End date must be on or after start date.', 'end');
    }
  }

  toExpression(): SpecificationExpression<Shipment> {
    return e.and(e.gte('shipDate', this.start), e.lte('shipDate', this.end));
  }
}

/**
 * Took more than `expectedDays` whole days from shipping to delivery.
 */
export class HasLongDeliveryTimeSpecification extends SpecificationBase<Shipment> {
  readonly expectedDays: number;

  constructor(expectedDays: number = 7) {
    super();
    this.expectedDays = Guard.againstNonPositive(expectedDays, 'expectedDays', 'Expected days must be positive.');
  }

  isSatisfiedBy(shipment: Shipment): boolean {
    if (!shipment.deliveryDate) {
      return false;
    }
    return wholeDaysBetween(shipment.shipDate, shipment.deliveryDate) > this.expectedDays;
  }
}

export class IsHeavyShipmentSpecification extends ExpressionSpecification<Shipment> {
  readonly threshold: number;

  constructor(threshold: number = 150) {
    super();
    this.threshold = Guard.againstNonPositive(threshold, 'threshold', 'Weight threshold must be positive.');
  }

  toExpression(): SpecificationExpression<Shipment> {
    return e.gt('weight', this.threshold);
  }
}

export class IsReturnedSpecification extends ExpressionSpecification<Shipment> {
  toExpression(): SpecificationExpression<Shipment> {
    return e.eq('status', 'Returned');
  }
}

export class IsShippedTodaySpecification extends SpecificationBase<Shipment> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(shipment: Shipment): boolean {
    return isSameUtcDay(shipment.shipDate, this.clock());
  }
}

/**
 * Delayed, stuck in an exception state, or returned.
 */
export class HasDeliveryIssuesSpecification extends ExpressionSpecification<Shipment> {
  toExpression(): SpecificationExpression<Shipment> {
    return e.in('status', ['Delayed', 'Exception', 'Returned']);
  }
}
