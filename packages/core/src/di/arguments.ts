import createDebug from "debug";
import type { InterfaceKey, ServiceRegistry } from "@tessera/types";
import { keyToString } from "./token";

const debug = createDebug("tessera:core:inject");

/**
 * Fills the positions the caller left `undefined` with the resolution of
 * their key, when that key is bound. Unbound positions stay `undefined`.
 * Arguments past the last known key are passed through untouched.
 */
export function resolvePositional(
  registry: ServiceRegistry,
  keys: readonly (InterfaceKey | undefined)[],
  explicitArgs: readonly unknown[],
): unknown[] {
  const length = Math.max(keys.length, explicitArgs.length);
  const args = Array.from({ length }, (_, index) => explicitArgs[index]);

  keys.forEach((key, index) => {
    if (args[index] !== undefined || key === undefined) return;
    if (!registry.has(key)) {
      debug("param %d: %s not bound, left to the callee", index, keyToString(key));
      return;
    }
    debug("param %d ← %s", index, keyToString(key));
    args[index] = registry.get(key);
  });

  return args;
}

/**
 * Named counterpart of {@link resolvePositional}: every dependency the
 * caller did not supply is resolved by key when bound.
 */
export function resolveNamed(
  registry: ServiceRegistry,
  dependencies: Readonly<Record<string, InterfaceKey>>,
  explicitArgs: object,
): Record<string, unknown> {
  const args: Record<string, unknown> = { ...explicitArgs };

  for (const [name, key] of Object.entries(dependencies)) {
    if (args[name] !== undefined) continue;
    if (!registry.has(key)) {
      debug("%s: %s not bound, left to the callee", name, keyToString(key));
      continue;
    }
    debug("%s ← %s", name, keyToString(key));
    args[name] = registry.get(key);
  }

  return args;
}
