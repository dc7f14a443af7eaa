import "reflect-metadata";
import createDebug from "debug";
import type {
  Type,
  InterfaceKey,
  Scope,
  Provider,
  ProviderSource,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Binding,
  BindingEntry,
  ProvidedBy,
  ServiceRegistry,
} from "@tessera/types";
import { INJECTABLE_METADATA } from "../metadata/constants";
import { CircularDependencyError, UnboundInterfaceError } from "../errors/di-errors";
import { getClassDependencyKeys } from "./dependency-tokens";
import { resolvePositional } from "./arguments";
import { keyToString } from "./token";
import { REGISTRY } from "./tokens";

const debug = createDebug("tessera:core:registry");

export type RegistryOptions = {
  /** Label used in debug output. */
  name?: string;
  /** Scope of class and factory providers that do not set one. */
  defaultScope?: Scope;
};

function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

function isFactoryProvider<T>(p: Provider<T>): p is FactoryProvider<T> {
  return "useFactory" in p;
}

function isValueProvider<T>(p: Provider<T>): p is ValueProvider<T> {
  return "useValue" in p;
}

function isBindingPair<T>(entry: Binding<T> | ProvidedBy<T>): entry is Binding<T> {
  return Array.isArray(entry);
}

export function toProvider<T>(source: ProviderSource<T>): Provider<T> {
  return typeof source === "function" ? { useClass: source } : source;
}

/** Normalises a `bindAll`/module entry to its key and provider. */
export function toBinding(entry: BindingEntry): readonly [InterfaceKey, Provider] {
  if (typeof entry === "function") return [entry, { useClass: entry }];
  if (isBindingPair(entry)) return [entry[0], toProvider(entry[1])];
  return [entry.provide, entry];
}

function describeProvider(provider: Provider): string {
  if (isClassProvider(provider)) return `class ${provider.useClass.name}`;
  if (isFactoryProvider(provider)) return "factory";
  return "value";
}

// Used for the internal map of providers where we can't track each specific
// Provider<T> type.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyProvider = Provider<any>;

/**
 * Mutable store of interface → provider bindings and the singleton
 * instances built from them.
 *
 * `get` always returns an instance: singleton providers are invoked once
 * per binding and cached, transient providers are invoked on every call.
 * Rebinding a key discards its cached instance.
 */
export class Registry implements ServiceRegistry {
  readonly name: string;
  private readonly defaultScope: Scope;
  private providers = new Map<InterfaceKey, AnyProvider>();
  private instances = new Map<InterfaceKey, unknown>();
  private resolving = new Set<InterfaceKey>();

  constructor(options: RegistryOptions = {}) {
    this.name = options.name ?? "default";
    this.defaultScope = options.defaultScope ?? "singleton";
    this.instances.set(REGISTRY, this);
  }

  get bindings(): ReadonlyMap<InterfaceKey, Provider> {
    return this.providers;
  }

  bind<T>(key: InterfaceKey<T>, source: ProviderSource<T>): this {
    const provider = toProvider(source);
    debug("[%s] bind %s (%s)", this.name, keyToString(key), describeProvider(provider));
    this.providers.set(key, provider);
    this.instances.delete(key);
    return this;
  }

  add<T>(target: Type<T>): this {
    return this.bind(target, target);
  }

  bindAll(...entries: BindingEntry[]): this {
    for (const entry of entries) {
      const [key, provider] = toBinding(entry);
      this.bind(key, provider);
    }
    return this;
  }

  has(key: InterfaceKey): boolean {
    return this.instances.has(key) || this.providers.has(key);
  }

  get<T>(key: InterfaceKey<T>): T {
    const name = keyToString(key);
    if (this.instances.has(key)) {
      debug("[%s] resolve %s → cached", this.name, name);
      return this.instances.get(key) as T;
    }

    if (this.resolving.has(key)) {
      throw new CircularDependencyError([...this.resolving, key]);
    }

    const provider: Provider<T> | undefined = this.providers.get(key);
    if (!provider) {
      throw new UnboundInterfaceError(key);
    }

    debug("[%s] resolve %s → constructing", this.name, name);
    this.resolving.add(key);
    try {
      const instance = this.create(provider);
      if (this.scopeOf(provider) === "singleton") {
        this.instances.set(key, instance);
      }
      return instance;
    } finally {
      this.resolving.delete(key);
    }
  }

  /**
   * Builds a fresh value from a provider without caching it. Dependencies
   * of the provider still resolve through `get`.
   */
  invoke<T>(source: ProviderSource<T>): T {
    const provider = toProvider(source);
    debug("[%s] invoke %s", this.name, describeProvider(provider));
    return this.create(provider);
  }

  /**
   * Constructs `target`, filling every constructor parameter the caller left
   * `undefined` whose key is bound in this registry. Explicit arguments win.
   * Classes not marked injectable receive the explicit arguments only.
   */
  construct<T>(target: Type<T>, ...explicitArgs: unknown[]): T {
    const isInjectable = Reflect.getOwnMetadata(INJECTABLE_METADATA, target) === true;
    if (!isInjectable) {
      debug("[%s] construct %s (not injectable)", this.name, target.name);
      return new target(...explicitArgs);
    }

    const keys = getClassDependencyKeys(target);
    debug(
      "[%s] construct %s deps=[%s]",
      this.name,
      target.name,
      keys.map((key) => (key === undefined ? "?" : keyToString(key))).join(", "),
    );
    return new target(...resolvePositional(this, keys, explicitArgs));
  }

  private scopeOf(provider: Provider): Scope {
    if (isValueProvider(provider)) return "singleton";
    return provider.scope ?? this.defaultScope;
  }

  private create<T>(provider: Provider<T>): T {
    if (isValueProvider(provider)) {
      return provider.useValue;
    }

    if (isClassProvider(provider)) {
      return this.construct(provider.useClass);
    }

    const deps = (provider.inject ?? []).map((key) => this.get(key));
    return provider.useFactory(...deps);
  }
}
