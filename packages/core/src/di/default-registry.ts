import type { Type, InterfaceKey, ProviderSource, BindingEntry } from "@tessera/types";
import { Registry } from "./registry";

/**
 * Process-wide registry used when no other one is given. Lives for the
 * lifetime of the process; there is no reset, so tests that need isolation
 * should construct their own {@link Registry}.
 */
export const registry = new Registry();

/**
 * Binds an interface to an implementation in the default registry.
 *
 * @example
 * bind(UserRepository, SqlUserRepository);
 * bind(API_KEY, { useFactory: () => new ApiKey(process.env.API_KEY ?? "") });
 */
export function bind<T>(key: InterfaceKey<T>, provider: ProviderSource<T>): void {
  registry.bind(key, provider);
}

/** Binds a class to itself in the default registry. */
export function add<T>(target: Type<T>): void {
  registry.add(target);
}

/**
 * Binds several entries in the default registry, in order. Each entry is a
 * `[key, provider]` pair, a `{ provide, ... }` provider or a bare class.
 */
export function bindAll(...entries: BindingEntry[]): void {
  registry.bindAll(...entries);
}

/** Resolves an interface against the default registry. */
export function get<T>(key: InterfaceKey<T>): T {
  return registry.get(key);
}

/** Constructs a class with its dependencies resolved from the default registry. */
export function construct<T>(target: Type<T>, ...explicitArgs: unknown[]): T {
  return registry.construct(target, ...explicitArgs);
}
