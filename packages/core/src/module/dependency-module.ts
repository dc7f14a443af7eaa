import type { BindingEntry, InterfaceKey, Type } from "@tessera/types";
import { registry as defaultRegistry } from "../di/default-registry";
import { getModuleMetadata, getModuleRegistry } from "../decorators/module";

/**
 * Optional base class for modules declared with `@Module()`.
 *
 * `get` delegates to the registry the module was registered into and is
 * not limited to the module's own or imported providers.
 */
export abstract class DependencyModule {
  get<T>(key: InterfaceKey<T>): T {
    const registry = getModuleRegistry(this.constructor) ?? defaultRegistry;
    return registry.get(key);
  }

  get imports(): readonly Type[] {
    return getModuleMetadata(this.constructor)?.imports ?? [];
  }

  get providers(): readonly BindingEntry[] {
    return getModuleMetadata(this.constructor)?.providers ?? [];
  }

  get exports(): readonly InterfaceKey[] {
    return getModuleMetadata(this.constructor)?.exports ?? [];
  }
}
