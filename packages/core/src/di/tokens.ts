import type { Registry } from "./registry";
import { InterfaceToken } from "./token";

// Always resolves to the registry performing the lookup.
export const REGISTRY = new InterfaceToken<Registry>("Registry");
