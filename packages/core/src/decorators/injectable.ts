import "reflect-metadata";
import type { InterfaceKey, Type } from "@tessera/types";
import { DEPENDENCIES_METADATA, INJECTABLE_METADATA, INJECT_METADATA } from "../metadata/constants";

/**
 * Marks a class for constructor injection. Its dependency keys are the
 * constructor's reflected parameter types, overridden per position by
 * `@Inject()`.
 */
export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
  };
}

export function Inject(key: InterfaceKey): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: Map<number, InterfaceKey> =
      Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
    existing.set(parameterIndex, key);
    Reflect.defineMetadata(INJECT_METADATA, existing, target);
  };
}

/**
 * Decorator-free form of {@link Injectable}: marks `target` injectable with
 * an explicit, ordered list of constructor dependency keys. `undefined`
 * leaves a position to the caller.
 *
 * @example
 * registry.add(injectable(UserController, [UserService, API_KEY]));
 */
export function injectable<T extends Type>(
  target: T,
  keys: readonly (InterfaceKey | undefined)[],
): T {
  Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
  Reflect.defineMetadata(DEPENDENCIES_METADATA, Object.freeze([...keys]), target);
  return target;
}
