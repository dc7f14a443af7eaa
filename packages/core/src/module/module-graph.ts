import "reflect-metadata";
import createDebug from "debug";
import type {
  Type,
  InterfaceKey,
  BindingEntry,
  ModuleState,
  ServiceRegistry,
} from "@tessera/types";
import { getModuleMetadata, getModuleState } from "../decorators/module";
import { getProviderDependencyKeys } from "../di/dependency-tokens";
import { toBinding } from "../di/registry";
import { keyToString } from "../di/token";
import {
  CircularModuleImportError,
  ModuleValidationError,
  type ModuleDiagnostic,
} from "../errors/di-errors";

const debug = createDebug("tessera:core:module");

export type ModuleNode = {
  moduleClass: Type;
  state: ModuleState;
  ownKeys: Set<InterfaceKey>;
  exports: Set<InterfaceKey>;
  imports: readonly Type[];
  providers: readonly BindingEntry[];
};

export type ModuleGraph = Map<Type, ModuleNode>;

// Reflected types TypeScript emits for primitives and interfaces. They are
// never bound, so a parameter typed with one is left to the caller.
const REFLECTED_BUILTINS = new Set<InterfaceKey>([
  Object,
  String,
  Number,
  Boolean,
  Array,
  Function,
  Promise,
]);

/**
 * Builds a module graph by walking the import tree depth-first, collecting
 * all metadata into a graph structure without any side effects.
 *
 * Detects circular module imports and deduplicates visited modules. A
 * class with no module metadata becomes a `declared` node with no providers.
 */
export function buildModuleGraph(rootModule: Type): ModuleGraph {
  const graph: ModuleGraph = new Map();
  const resolving = new Set<Type>();

  function walk(moduleClass: Type, importChain: Type[]): void {
    if (graph.has(moduleClass)) {
      debug("walk %s → already visited", moduleClass.name);
      return;
    }

    if (resolving.has(moduleClass)) {
      throw new CircularModuleImportError([...importChain, moduleClass]);
    }

    resolving.add(moduleClass);

    const metadata = getModuleMetadata(moduleClass);
    const imports = metadata?.imports ?? [];
    for (const imported of imports) {
      walk(imported, [...importChain, moduleClass]);
    }

    const providers = metadata?.providers ?? [];
    const ownKeys = new Set<InterfaceKey>(providers.map((entry) => toBinding(entry)[0]));

    resolving.delete(moduleClass);
    debug("walk %s: %d providers, %d imports", moduleClass.name, providers.length, imports.length);
    graph.set(moduleClass, {
      moduleClass,
      state: getModuleState(moduleClass),
      ownKeys,
      exports: new Set(metadata?.exports ?? []),
      imports,
      providers,
    });
  }

  walk(rootModule, []);
  return graph;
}

/**
 * Validates the module graph against a registry and throws one
 * `ModuleValidationError` listing every problem found:
 * 1. Exported keys are actually provided by the module
 * 2. Imported modules have been registered (imports are not transitive)
 * 3. Provider dependencies are bound in the registry
 */
export function validateModuleGraph(graph: ModuleGraph, registry: ServiceRegistry): void {
  const diagnostics: ModuleDiagnostic[] = [];

  for (const [, node] of graph) {
    const moduleName = node.moduleClass.name;

    for (const exportKey of node.exports) {
      if (!node.ownKeys.has(exportKey)) {
        diagnostics.push({
          type: "invalid_export",
          module: node.moduleClass,
          message:
            `${moduleName} exports ${keyToString(exportKey)}, ` +
            "but that key is not provided by this module.",
        });
      }
    }

    for (const imported of node.imports) {
      if (graph.get(imported)?.state !== "registered") {
        diagnostics.push({
          type: "unregistered_import",
          module: node.moduleClass,
          message:
            `${moduleName} imports ${imported.name}, which has not been registered. ` +
            `Decorate ${imported.name} with @Module() so its providers are bound.`,
        });
      }
    }

    for (const entry of node.providers) {
      const [consumer, provider] = toBinding(entry);
      for (const dep of getProviderDependencyKeys(provider)) {
        if (registry.has(dep) || REFLECTED_BUILTINS.has(dep)) continue;
        diagnostics.push({
          type: "missing_dependency",
          module: node.moduleClass,
          message:
            `${keyToString(consumer)} in ${moduleName} requires ${keyToString(dep)} — no provider bound. ` +
            "Bind it directly, or register the module that provides it.",
        });
      }
    }
  }

  debug("validateModuleGraph: %d modules, %d diagnostics", graph.size, diagnostics.length);

  if (diagnostics.length > 0) {
    throw new ModuleValidationError(diagnostics);
  }
}
