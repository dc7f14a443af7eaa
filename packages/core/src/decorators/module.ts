import "reflect-metadata";
import createDebug from "debug";
import type { BindingEntry, InterfaceKey, ModuleMetadata, ModuleState, Type } from "@tessera/types";
import { MODULE_METADATA, MODULE_REGISTRY_METADATA } from "../metadata/constants";
import { registry as defaultRegistry } from "../di/default-registry";
import type { Registry } from "../di/registry";

const debug = createDebug("tessera:core:module");

export type ModuleOptions = ModuleMetadata & {
  /** Registry the providers are bound into. Defaults to the process-wide one. */
  registry?: Registry;
};

export type RegisteredModuleMetadata = {
  readonly imports: readonly Type[];
  readonly providers: readonly BindingEntry[];
  readonly exports: readonly InterfaceKey[];
};

/**
 * Declares a module and registers it: the metadata is frozen on the class
 * and `providers` are bound into the registry straight away. Imported
 * modules are recorded, not registered; each one registers itself when it
 * is decorated.
 */
export function Module(options: ModuleOptions): ClassDecorator {
  return (target) => {
    const registry = options.registry ?? defaultRegistry;
    const metadata: RegisteredModuleMetadata = Object.freeze({
      imports: Object.freeze([...(options.imports ?? [])]),
      providers: Object.freeze([...(options.providers ?? [])]),
      exports: Object.freeze([...(options.exports ?? [])]),
    });

    Reflect.defineMetadata(MODULE_METADATA, metadata, target);
    Reflect.defineMetadata(MODULE_REGISTRY_METADATA, registry, target);
    registry.bindAll(...metadata.providers);

    debug(
      "register %s into %s: %d providers, %d imports, %d exports",
      target.name,
      registry.name,
      metadata.providers.length,
      metadata.imports.length,
      metadata.exports.length,
    );
  };
}

export function getModuleMetadata(moduleClass: object): RegisteredModuleMetadata | undefined {
  return Reflect.getOwnMetadata(MODULE_METADATA, moduleClass);
}

export function getModuleRegistry(moduleClass: object): Registry | undefined {
  return Reflect.getOwnMetadata(MODULE_REGISTRY_METADATA, moduleClass);
}

export function getModuleState(moduleClass: object): ModuleState {
  return getModuleMetadata(moduleClass) ? "registered" : "declared";
}
