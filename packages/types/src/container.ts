import type { BindingEntry, InterfaceKey, Provider, ProviderSource } from "./common";

/** Minimal registry contract shared by modules and injected callables. */
export interface ServiceRegistry {
  bind<T>(key: InterfaceKey<T>, provider: ProviderSource<T>): this;
  bindAll(...entries: BindingEntry[]): this;
  get<T>(key: InterfaceKey<T>): T;
  has(key: InterfaceKey): boolean;
  readonly bindings: ReadonlyMap<InterfaceKey, Provider>;
}
