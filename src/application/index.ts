/**
 * @module application
 * @description Configuration and logging for policy stacks
 */

export * from './config';
export * from './logging';
