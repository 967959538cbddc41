export * as ClientSpecifications from './ClientSpecifications';
export * as ProductSpecifications from './ProductSpecifications';
export * as InventorySpecifications from './InventorySpecifications';
export * as OrderSpecifications from './OrderSpecifications';
export * as ShipmentSpecifications from './ShipmentSpecifications';
