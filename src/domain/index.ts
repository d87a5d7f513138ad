/**
 * @module domain
 * @description Request contracts and the error taxonomy
 */

export * from './exceptions';
export * from './request';
