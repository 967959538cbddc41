/**
 * Rules over products: ownership, handling needs, value and shelf life.
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
import { PRODUCT_CATEGORIES, Product, ProductCategory } from '../models/Product';
import { requireOneOf } from '../models/common';

const e = expressionsFor<Product>();

export class BelongsToClientSpecification extends ExpressionSpecification<Product> {
  readonly clientId: string;

  constructor(clientId: string) {
    super();
    this.clientId = Guard.againstBlank(clientId, 'clientId');
  }

  toExpression(): SpecificationExpression<Product> {
    return e.eq('clientId', this.clientId);
  }
}

export class IsHazmatSpecification extends ExpressionSpecification<Product> {
  toExpression(): SpecificationExpression<Product> {
    return e.eq('isHazmat', true);
  }
}

export class IsFragileSpecification extends ExpressionSpecification<Product> {
  toExpression(): SpecificationExpression<Product> {
    return e.eq('isFragile', true);
  }
}

export class RequiresRefrigerationSpecification extends ExpressionSpecification<Product> {
  toExpression(): SpecificationExpression<Product> {
    return e.eq('requiresRefrigeration', true);
  }
}

/**
 * Anything with an expiration date.
 */
export class IsPerishableSpecification extends ExpressionSpecification<Product> {
  toExpression(): SpecificationExpression<Product> {
    return e.not(e.isNull('expirationDate'));
  }
}

export class IsExpiredSpecification extends SpecificationBase<Product> {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  isSatisfiedBy(product: Product): boolean {
    return (
      product.expirationDate !== undefined &&
      product.expirationDate.getTime() < this.clock().getTime()
    );
  }
}

/**
 * Expires within `days` whole days from now (inclusive). Fractional days are
 * truncated, so a product that expired a few hours ago still counts as day 0.
 */
export class IsExpiringSpecification extends SpecificationBase<Product> {
  readonly days: number;

  constructor(
    days: number = 30,
    private readonly clock: Clock = systemClock,
  ) {
    super();
    this.days = Guard.againstNegative(days, 'days', 'Days until expiration must be non-negative.');
  }

  isSatisfiedBy(product: Product): boolean {
    if (!product.expirationDate) {
      return false;
    }
    const remaining = wholeDaysBetween(this.clock(), product.expirationDate);
    return remaining >= 0 && remaining <= this.days;
  }
}

export class IsCategorySpecification extends ExpressionSpecification<Product> {
  readonly category: ProductCategory;

  constructor(category: ProductCategory) {
    super();
    this.category = requireOneOf(PRODUCT_CATEGORIES, category, 'category');
  }

  toExpression(): SpecificationExpression<Product> {
    return e.eq('category', this.category);
  }
}

export class ExceedsWeightSpecification extends ExpressionSpecification<Product> {
  readonly threshold: number;

  constructor(threshold: number) {
    super();
    this.threshold = Guard.againstNegative(threshold, 'threshold', 'Weight threshold must be non-negative.');
  }

  toExpression(): SpecificationExpression<Product> {
    return e.gt('weight', this.threshold);
  }
}

export class IsHighValueSpecification extends ExpressionSpecification<Product> {
  readonly threshold: number;

  constructor(threshold: number = 1000) {
    super();
    this.threshold = Guard.againstNegative(threshold, 'threshold', 'Value threshold must be non-negative.');
  }

  toExpression(): SpecificationExpression<Product> {
    return e.gt('unitCost', this.threshold);
  }
}

/**
 * Hazmat, fragile or refrigerated.
 */
export class RequiresSpecialHandlingSpecification extends ExpressionSpecification<Product> {
  toExpression(): SpecificationExpression<Product> {
    return e.or(e.eq('isHazmat', true), e.eq('isFragile', true), e.eq('requiresRefrigeration', true));
  }
}

export class IsOversizedSpecification extends SpecificationBase<Product> {
  readonly volumeThreshold: number;

  constructor(volumeThreshold: number = 10000) {
    super();
    this.volumeThreshold = Guard.againstNegative(
      volumeThreshold,
      'volumeThreshold',
      'Volume threshold must be non-negative.',
    );
  }

  isSatisfiedBy(product: Product): boolean {
    return product.dimensions.volume > this.volumeThreshold;
  }
}
