/**
 * @module specwise/domain
 * @description Domain layer exports
 */

// ============================================================================
// Exceptions & Guards
// ============================================================================

export * from './exceptions';

// ============================================================================
// Specification Pattern
// ============================================================================

export * from './specification';

// ============================================================================
// Time
// ============================================================================

export * from './time';
