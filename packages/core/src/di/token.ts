import type { InterfaceKey, TypedToken } from "@tessera/types";

/**
 * Identity key for a contract with no runtime value, such as an
 * interface or a parameterised type.
 *
 * @example
 * const USER_REPOSITORY = new InterfaceToken<Repository<User>>("Repository<User>");
 * registry.bind(USER_REPOSITORY, SqlUserRepository);
 */
export class InterfaceToken<T = unknown> implements TypedToken<T> {
  declare readonly __type?: T;

  constructor(readonly name: string) {}

  toString(): string {
    return `InterfaceToken(${this.name})`;
  }
}

export function keyToString(key: InterfaceKey): string {
  if (typeof key === "function") return key.name;
  if (typeof key === "string") return key;
  if (typeof key === "symbol") return key.toString();
  return key.name;
}
