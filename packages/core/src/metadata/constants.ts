export const INJECTABLE_METADATA = "tessera:injectable";
export const INJECT_METADATA = "tessera:inject";
export const DEPENDENCIES_METADATA = "tessera:dependencies";
export const MODULE_METADATA = "tessera:module";
export const MODULE_REGISTRY_METADATA = "tessera:module:registry";
