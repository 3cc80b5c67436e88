import type { ClassInstance } from "./ClassInstance";
import { type Scope, scopeSymbol } from "./runtime-types";

/**
 * Runs `fn` with the instance's current scope raised to `scope`.
 * The previous scope comes back on every exit path, throws included, so nested and overriding calls
 * unwind one level at a time instead of dropping straight back to public.
 */
export function withScope<T>(instance: ClassInstance, scope: Scope, fn: () => T): T {
  const previous = instance[scopeSymbol];
  instance[scopeSymbol] = scope;
  try {
    return fn();
  } finally {
    instance[scopeSymbol] = previous;
  }
}
