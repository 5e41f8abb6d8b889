/**
 * Typed listener registry behind each event hook.
 *
 * `make()` returns the `[on, once, off, emit, clear]` tuple every hook module exports.
 * `emit` runs listeners concurrently; a throwing listener is logged and never blocks the
 * others.
 */
export type HookListener<TArgs extends unknown[]> = (
  ...args: TArgs
) => Promise<void> | void;

export function createEventHook<TArgs extends unknown[]>() {
  const listeners = new Map<HookListener<TArgs>, { once: boolean }>();

  const on = (listener: HookListener<TArgs>): (() => void) => {
    listeners.set(listener, { once: false });
    return () => off(listener);
  };

  const once = (listener: HookListener<TArgs>): (() => void) => {
    listeners.set(listener, { once: true });
    return () => off(listener);
  };

  const off = (listener: HookListener<TArgs>): boolean => listeners.delete(listener);

  const emit = async (...args: TArgs): Promise<void> => {
    const snapshot = [...listeners.entries()];
    for (const [listener, options] of snapshot) {
      if (options.once) listeners.delete(listener);
    }

    const results = await Promise.allSettled(
      snapshot.map(async ([listener]) => listener(...args)),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("[hooks] listener failed:", result.reason);
      }
    }
  };

  const clear = (): void => listeners.clear();

  return {
    make: () => [on, once, off, emit, clear] as const,
  };
}
