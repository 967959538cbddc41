/**
 * Rules over warehouse clients and their contracts.
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
import { CLIENT_TIERS, Client, ClientTier } from '../models/Client';
import { requireOneOf } from '../models/common';

const e = expressionsFor<Client>();

export const LONG_TERM_CONTRACT_DAYS = 365;

export class IsActiveSpecification extends ExpressionSpecification<Client> {
  toExpression(): SpecificationExpression<Client> {
    return e.eq('isActive', true);
  }
}

export class IsTierSpecification extends ExpressionSpecification<Client> {
  readonly tier: ClientTier;

  constructor(tier: ClientTier) {
    super();
    this.tier = requireOneOf(CLIENT_TIERS, tier, 'tier');
  }

  toExpression(): SpecificationExpression<Client> {
    return e.eq('tier', this.tier);
  }
}

export class IsPremiumOrEnterpriseSpecification extends ExpressionSpecification<Client> {
  toExpression(): SpecificationExpression<Client> {
    return e.in('tier', ['Premium', 'Enterprise']);
  }
}

/**
 * The contract has an end date that is already in the past.
 */
export class HasExpiredContractSpecification extends SpecificationBase<Client> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(client: Client): boolean {
    return (
      client.contractEndDate !== undefined &&
      client.contractEndDate.getTime() < this.clock().getTime()
    );
  }
}

/**
 * The contract ends within `days` whole days from now (inclusive).
 */
export class ContractExpiringSpecification extends SpecificationBase<Client> {
  readonly days: number;

  constructor(
    days: number = 30,
    private readonly clock: Clock = systemClock,
  ) {
    super();
    this.days = Guard.againstNegative(days, 'days', 'Days until expiration must be non-negative.');
  }

  isSatisfiedBy(client: Client): boolean {
    if (!client.contractEndDate) {
      return false;
    }
    const remaining = wholeDaysBetween(this.clock(), client.contractEndDate);
    return remaining >= 0 && remaining <= this.days;
  }
}

/**
 * The contract runs for at least a year.
 */
export class HasLongTermContractSpecification extends SpecificationBase<Client> {
  isSatisfiedBy(client: Client): boolean {
    if (!client.contractEndDate) {
      return false;
    }
    return wholeDaysBetween(client.contractStartDate, client.contractEndDate) >= LONG_TERM_CONTRACT_DAYS;
  }
}
