import "reflect-metadata";
import type {
  Type,
  InterfaceKey,
  Provider,
  ClassProvider,
  FactoryProvider,
} from "@tessera/types";
import { DEPENDENCIES_METADATA, INJECT_METADATA } from "../metadata/constants";

function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

function isFactoryProvider<T>(p: Provider<T>): p is FactoryProvider<T> {
  return "useFactory" in p;
}

/**
 * Reads the constructor dependency keys of a class, position by position.
 *
 * An explicit list recorded by `injectable(target, keys)` wins. Otherwise
 * the keys come from `design:paramtypes`, with `@Inject()` overrides applied.
 * A position with no known key is `undefined` and is never resolved.
 *
 * Reads metadata only; never touches a registry.
 */
export function getClassDependencyKeys(target: Type): (InterfaceKey | undefined)[] {
  const explicit: readonly (InterfaceKey | undefined)[] | undefined = Reflect.getOwnMetadata(
    DEPENDENCIES_METADATA,
    target,
  );
  if (explicit) return [...explicit];

  // A class that declares its own constructor owns its parameter metadata;
  // only an inherited constructor takes the base class's.
  const ownParamTypes: Type[] | undefined = Reflect.getOwnMetadata("design:paramtypes", target);
  const ownOverrides: Map<number, InterfaceKey> | undefined = Reflect.getOwnMetadata(
    INJECT_METADATA,
    target,
  );
  const declaresConstructor = ownParamTypes !== undefined || ownOverrides !== undefined;

  const paramTypes: Type[] = declaresConstructor
    ? (ownParamTypes ?? [])
    : (Reflect.getMetadata("design:paramtypes", target) ?? []);
  const injectOverrides: Map<number, InterfaceKey> = declaresConstructor
    ? (ownOverrides ?? new Map())
    : (Reflect.getMetadata(INJECT_METADATA, target) ?? new Map());

  const length = Math.max(paramTypes.length, ...[...injectOverrides.keys()].map((i) => i + 1));
  return Array.from({ length }, (_, index) => injectOverrides.get(index) ?? paramTypes[index]);
}

/**
 * Determines the dependency keys for a provider (class, factory, or value).
 *
 * Reads metadata only; never touches a registry.
 */
export function getProviderDependencyKeys(provider: Provider): InterfaceKey[] {
  if (isClassProvider(provider)) {
    return getClassDependencyKeys(provider.useClass).filter(
      (key): key is InterfaceKey => key !== undefined,
    );
  }
  if (isFactoryProvider(provider) && provider.inject) {
    return [...provider.inject];
  }
  return [];
}
