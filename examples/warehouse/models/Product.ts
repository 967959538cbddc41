import { ArgumentException, Guard } from '../../../src';
import { optionalDate, requireOneOf } from './common';

export const PRODUCT_CATEGORIES = [
  'Automotive',
  'Beauty',
  'Electronics',
  'Food',
  'Apparel',
  'Industrial',
  'General',
] as const;

export type ProductCategory = (typeof PRODUCT_CATEGORIES)[number];

/**
 * Package dimensions; `volume` is length × width × height.
 */
export interface Dimensions {
  readonly length: number;
  readonly width: number;
  readonly height: number;
  readonly volume: number;
}

export function createDimensions(length: number, width: number, height: number): Dimensions {
  const message = 'All dimensions must be greater than zero.';
  Guard.againstNonPositive(length, 'length', message);
  Guard.againstNonPositive(width, 'width', message);
  Guard.againstNonPositive(height, 'height', message);

  return { length, width, height, volume: length * width * height };
}

export interface Product {
  readonly sku: string;
  readonly clientId: string;
  readonly name: string;
  readonly description: string;
  readonly category: ProductCategory;
  readonly weight: number;
  readonly dimensions: Dimensions;
  readonly isFragile: boolean;
  readonly isHazmat: boolean;
  readonly requiresRefrigeration: boolean;
  readonly unitCost: number;
  /** Only perishable products carry one */
  readonly expirationDate?: Date;
}

export interface ProductInput {
  sku: string;
  clientId: string;
  name: string;
  description?: string;
  category: ProductCategory;
  weight: number;
  dimensions: Dimensions;
  isFragile?: boolean;
  isHazmat?: boolean;
  requiresRefrigeration?: boolean;
  /** @defaultValue 0 */
  unitCost?: number;
  expirationDate?: Date;
}

/**
 * @throws ArgumentException for blank identifiers, a non-positive weight or a
 * negative unit cost
 */
export function createProduct(input: ProductInput): Product {
  const dimensions = Guard.againstNull(input.dimensions, 'dimensions');
  if (!(dimensions.length > 0 && dimensions.width > 0 && dimensions.height > 0)) {
    throw new ArgumentException('All dimensions must be greater than zero.', 'dimensions');
  }

  return {
    sku: Guard.againstBlank(input.sku, 'sku'),
    clientId: Guard.againstBlank(input.clientId, 'clientId'),
    name: Guard.againstBlank(input.name, 'name'),
    description: input.description ?? '',
    category: requireOneOf(PRODUCT_CATEGORIES, input.category, 'category'),
    weight: Guard.againstNonPositive(input.weight, 'weight', 'Weight must be greater than zero.'),
    dimensions,
    isFragile: input.isFragile ?? false,
    isHazmat: input.isHazmat ?? false,
    requiresRefrigeration: input.requiresRefrigeration ?? false,
    unitCost: Guard.againstNegative(input.unitCost ?? 0, 'unitCost', 'Unit cost cannot be negative.'),
    expirationDate: optionalDate(input.expirationDate, 'expirationDate'),
  };
}
