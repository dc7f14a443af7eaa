import type {
  AbstractType,
  Binding,
  InterfaceKey,
  ProviderSource,
  ServiceRegistry,
  TypedToken,
} from "@tessera/types";
import { resolveNamed } from "./arguments";
import { registry as defaultRegistry } from "./default-registry";
import type { Registry } from "./registry";
import { REGISTRY } from "./tokens";

export type DependencyMap = Readonly<Record<string, InterfaceKey>>;

// Value type a key resolves to; string and symbol keys carry none.
export type ResolvedKey<K> =
  K extends AbstractType<infer T> ? T : K extends TypedToken<infer T> ? T : unknown;

export type ResolvedDependencies<D extends DependencyMap> = {
  [Name in keyof D]: ResolvedKey<D[Name]>;
};

export type InjectedFunction<D extends DependencyMap, R> = (
  explicit?: Partial<ResolvedDependencies<D>>,
) => R;

/**
 * Wraps `fn` so that each named dependency the caller does not pass is
 * resolved by key from `registry` when bound. Unbound dependencies are
 * left out and explicit values always win.
 *
 * @example
 * const createUser = inject({ repo: USER_REPOSITORY }, ({ repo }) => {
 *   return async (dto: CreateUserDto) => repo.save(new User(dto.id, dto.name));
 * });
 * const run = createUser();
 */
export function inject<D extends DependencyMap, R>(
  dependencies: D,
  fn: (deps: ResolvedDependencies<D>) => R,
  registry: ServiceRegistry = defaultRegistry,
): InjectedFunction<D, R> {
  const declared: DependencyMap = Object.freeze({ ...dependencies });
  return (explicit) => {
    const args = resolveNamed(registry, declared, explicit ?? {});
    return fn(args as ResolvedDependencies<D>);
  };
}

/**
 * Binds one key to several implementations. Resolving the key builds each
 * implementation in declaration order and returns them as an array.
 *
 * @example
 * registry.bindAll(provideMany(USE_CASES, [CreateUser, GetUser]));
 */
export function provideMany<T>(
  key: InterfaceKey<T[]>,
  implementations: readonly ProviderSource<T>[],
): Binding<T[]> {
  const sources = [...implementations];
  return [
    key,
    {
      useFactory: (target: Registry) => sources.map((source) => target.invoke(source)),
      inject: [REGISTRY],
    },
  ];
}
