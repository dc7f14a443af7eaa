// Constructor type for DI. Uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// The registry resolves the actual arguments at runtime.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Opaque key for contracts that have no runtime value of their own:
 * TypeScript interfaces, function signatures, parameterised types.
 * Compared by identity, never by name.
 */
export interface TypedToken<T = unknown> {
  readonly name: string;
  // Phantom field carrying the resolved type; never set at runtime.
  readonly __type?: T;
}

// Key for dependency injection: class, abstract class, token, string or symbol
export type InterfaceKey<T = unknown> =
  | Type<T>
  | AbstractType<T>
  | TypedToken<T>
  | string
  | symbol;

// Lifetime of a class or factory binding
export type Scope = "singleton" | "transient";

export type ClassProvider<T = unknown> = {
  useClass: Type<T>;
  scope?: Scope;
};

export type FactoryProvider<T = unknown> = {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => T;
  inject?: InterfaceKey[];
  scope?: Scope;
};

export type ValueProvider<T = unknown> = {
  useValue: T;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T> | ValueProvider<T>;

// A class is shorthand for `{ useClass }`
export type ProviderSource<T = unknown> = Type<T> | Provider<T>;

export type Binding<T = unknown> = readonly [InterfaceKey<T>, ProviderSource<T>];

export type ProvidedBy<T = unknown> = Provider<T> & { provide: InterfaceKey<T> };

// Anything bindAll and module `providers` accept
export type BindingEntry =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  Type | Binding<any> | ProvidedBy<any>;
