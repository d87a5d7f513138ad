/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Policy layers, their composition into stacks, and the supporting cache and
 * time utilities.
 *
 * @packageDocumentation
 * @module infrastructure
 */

// Resilience policies
export * from './resilience';

// Stack composition
export * from './pipeline';

// TTL caching
export * from './cache';

// Clock and cancellable sleep
export * from './time';
