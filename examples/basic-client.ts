/**
 * Basic example
 *
 * Wraps a flaky in-memory "users" backend in a policy stack built from a
 * configuration object and issues a few calls through it.
 *
 * Run with any TypeScript runner, e.g. `tsx examples/basic-client.ts`.
 */

import {
  PermanentError,
  TransientError,
  consoleLogger,
  createPolicyStack,
  isResilienceError,
} from '../src/index';
import type { InvocationContext, ResilientRequest } from '../src/index';

// ==================== Backend ====================

interface UserRequest extends ResilientRequest {
  readonly userId: string;
}

interface User {
  readonly id: string;
  readonly name: string;
}

const users = new Map<string, User>([
  ['42', { id: '42', name: 'Ada' }],
  ['7', { id: '7', name: 'Grace' }],
]);

let callCount = 0;

// Every third call fails with a simulated 503
async function fetchUser(request: UserRequest, { attempt, signal }: InvocationContext): Promise<User> {
  callCount++;
  console.log(`-> GET /users/${request.userId} (attempt ${attempt})`);

  await new Promise((resolve) => setTimeout(resolve, 20));
  if (signal.aborted) {
    throw new TransientError('aborted by stack');
  }
  if (callCount % 3 === 1) {
    throw new TransientError('503 Service Unavailable');
  }

  const user = users.get(request.userId);
  if (!user) {
    throw new PermanentError(`404 user ${request.userId} not found`);
  }
  return user;
}

const userRequest = (userId: string): UserRequest => ({
  userId,
  cacheKey: `GET /users/${userId}`,
  target: 'users-api',
});

// ==================== Stack ====================

const stack = createPolicyStack<UserRequest, User>(
  {
    rateLimit: { enabled: true, maxRequests: 20, window: 1_000 },
    circuitBreaker: { enabled: true, failureThreshold: 5, resetTimeout: 30_000 },
    retry: {
      enabled: true,
      maxAttempts: 3,
      policy: { type: 'exponential', baseDelay: 50, maxDelay: 500 },
    },
    cache: { enabled: true, ttl: 10_000, maxEntries: 100 },
    attemptTimeout: 1_000,
  },
  fetchUser,
  { logger: consoleLogger },
);

// ==================== Main ====================

async function main(): Promise<void> {
  for (const userId of ['42', '42', '7', '99']) {
    try {
      const user = await stack.call(userRequest(userId));
      console.log(`<- ${user.name}`);
    } catch (error) {
      if (isResilienceError(error)) {
        console.log(`<- ${error.name} (${error.kind}): ${error.message}`);
      } else {
        throw error;
      }
    }
  }

  console.log('Stats:', JSON.stringify(stack.getStats(), null, 2));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
