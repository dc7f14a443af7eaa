import type { InterfaceKey, Type } from "@tessera/types";
import { keyToString } from "../di/token";

export type ModuleDiagnostic = {
  type: "invalid_export" | "unregistered_import" | "missing_dependency";
  module: Type;
  message: string;
};

export class UnboundInterfaceError extends Error {
  constructor(public readonly key: InterfaceKey) {
    super(
      `No provider bound for ${keyToString(key)}.\n` +
        'Bind one with bind(), or list it in the "providers" of a registered module.',
    );
    this.name = "UnboundInterfaceError";
  }
}

export class CircularDependencyError extends Error {
  constructor(public readonly path: readonly InterfaceKey[]) {
    super(`Circular dependency detected: ${path.map(keyToString).join(" → ")}`);
    this.name = "CircularDependencyError";
  }
}

export class CircularModuleImportError extends Error {
  constructor(public readonly path: readonly Type[]) {
    super(`Circular module import detected: ${path.map((m) => m.name).join(" → ")}`);
    this.name = "CircularModuleImportError";
  }
}

export class ModuleValidationError extends Error {
  constructor(public readonly diagnostics: readonly ModuleDiagnostic[]) {
    const details = diagnostics.map((d) => `  ${d.message}`).join("\n");
    super(`Module validation errors:\n\n${details}`);
    this.name = "ModuleValidationError";
  }
}
