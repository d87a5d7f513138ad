/**
 * @fileoverview Test doubles shared by the policy tests
 */

import { jest } from '@jest/globals';
import type { Clock, InvocationContext, ResilientRequest, Sleeper } from '../../src';

// ============================================================================
// Requests
// ============================================================================

export interface TestRequest extends ResilientRequest {
  readonly path: string;
}

export function request(path: string, target: string = 'users-api'): TestRequest {
  return { path, cacheKey: `GET ${path}`, target };
}

// ============================================================================
// Invoker
// ============================================================================

export type TestInvoker = (req: TestRequest, context: InvocationContext) => Promise<string>;

export function createInvoker() {
  return jest.fn<TestInvoker>();
}

// ============================================================================
// Time
// ============================================================================

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  constructor(private time: number = 1_000_000) {}

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

/**
 * Sleeper that records requested delays and resolves on the next tick
 */
export function createRecordingSleeper(): Sleeper & { delays: number[] } {
  const delays: number[] = [];
  const sleeper = (ms: number, signal?: AbortSignal): Promise<void> => {
    delays.push(ms);
    return signal?.aborted ? Promise.reject(signal.reason) : Promise.resolve();
  };
  return Object.assign(sleeper, { delays });
}

// ============================================================================
// Concurrency
// ============================================================================

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Let pending promise callbacks run
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}
