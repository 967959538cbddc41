export * from './common';
export * from './Client';
export * from './Product';
export * from './Inventory';
export * from './Location';
export * from './Order';
export * from './Shipment';
