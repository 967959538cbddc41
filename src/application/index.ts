/**
 * @module specwise/application
 * @description Application layer exports
 */

// ============================================================================
// Evaluation
// ============================================================================

export * from './evaluation';

// ============================================================================
// Hosting (logging & configuration)
// ============================================================================

export * from './host';
