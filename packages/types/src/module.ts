import type { Type, InterfaceKey, BindingEntry } from "./common";

export type ModuleMetadata = {
  imports?: Type[];
  providers?: BindingEntry[];
  exports?: InterfaceKey[];
};

export type ModuleState = "declared" | "registered";
