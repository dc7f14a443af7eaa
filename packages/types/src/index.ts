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
} from "./common";

export type { ServiceRegistry } from "./container";

export type { ModuleMetadata, ModuleState } from "./module";
