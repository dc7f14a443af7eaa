import "reflect-metadata";

// Decorators
export { Injectable, Inject, injectable } from "./decorators/injectable";
export {
  Module,
  getModuleMetadata,
  getModuleRegistry,
  getModuleState,
} from "./decorators/module";

// DI
export { Registry, toProvider, toBinding } from "./di/registry";
export { InterfaceToken, keyToString } from "./di/token";
export { REGISTRY } from "./di/tokens";
export { registry, bind, add, bindAll, get, construct } from "./di/default-registry";
export { inject, provideMany } from "./di/inject";
export { getClassDependencyKeys, getProviderDependencyKeys } from "./di/dependency-tokens";

// Modules
export { DependencyModule } from "./module/dependency-module";
export { buildModuleGraph, validateModuleGraph } from "./module/module-graph";

// Errors
export {
  UnboundInterfaceError,
  CircularDependencyError,
  CircularModuleImportError,
  ModuleValidationError,
} from "./errors/di-errors";

// Re-export key types from @tessera/types
export type {
  Type,
  AbstractType,
  TypedToken,
  InterfaceKey,
  Scope,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Provider,
  ProviderSource,
  Binding,
  ProvidedBy,
  BindingEntry,
  ModuleMetadata,
  ModuleState,
  ServiceRegistry,
} from "@tessera/types";

// Re-export types defined in core
export type { RegistryOptions } from "./di/registry";
export type {
  DependencyMap,
  ResolvedKey,
  ResolvedDependencies,
  InjectedFunction,
} from "./di/inject";
export type { ModuleOptions, RegisteredModuleMetadata } from "./decorators/module";
export type { ModuleNode, ModuleGraph } from "./module/module-graph";
export type { ModuleDiagnostic } from "./errors/di-errors";
