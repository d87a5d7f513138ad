/**
 * Per-target state arena.
 *
 * Rate limit windows and circuit breaker states live here, one entry per
 * target. `update` is the only way to read-and-modify an entry: the callback
 * runs synchronously, so no other caller can observe or change the same
 * target's state between the check and the write. Callbacks must not await.
 *
 * @template TState - Mutable state kept per key
 */
export class KeyedStateStore<TState> {
  private readonly states = new Map<string, TState>();

  constructor(private readonly createState: () => TState) {}

  /**
   * Run `mutate` as one critical section on the state for `key`, creating the
   * state on first use.
   */
  update<TResult>(key: string, mutate: (state: TState) => TResult): TResult {
    let state = this.states.get(key);
    if (state === undefined) {
      state = this.createState();
      this.states.set(key, state);
    }
    return mutate(state);
  }

  /**
   * Read-only access; never creates state.
   */
  peek<TResult>(key: string, read: (state: Readonly<TState>) => TResult): TResult | undefined {
    const state = this.states.get(key);
    return state === undefined ? undefined : read(state);
  }

  keys(): string[] {
    return Array.from(this.states.keys());
  }

  delete(key: string): boolean {
    return this.states.delete(key);
  }

  clear(): void {
    this.states.clear();
  }

  get size(): number {
    return this.states.size;
  }
}
