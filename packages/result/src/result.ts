import { isDeepStrictEqual } from "node:util";
import { ResultContractError } from "./errors";

function errorsEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Error && b instanceof Error) {
    // Own enumerable fields hold the constructor arguments beyond the message
    return (
      a.constructor === b.constructor &&
      a.message === b.message &&
      isDeepStrictEqual(a.cause, b.cause) &&
      isDeepStrictEqual(a, b)
    );
  }
  return isDeepStrictEqual(a, b);
}

function display(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/**
 * Outcome of an operation: either `Ok(value)` or `Error(error)`.
 *
 * On the variant that does not apply, `value` or `error` reads as `null`.
 * Constructing an ok result that carries an error throws
 * {@link ResultContractError}.
 */
export class Result<T, E = Error> {
  private readonly _value: T | null;
  private readonly _error: E | null;
  private readonly _isOk: boolean;

  constructor(value: T | null, error: E | null, isOk = true) {
    if (isOk && error !== null && error !== undefined) {
      throw new ResultContractError();
    }
    this._value = value;
    this._error = error;
    this._isOk = isOk;
  }

  static ok(): Result<null, never>;
  static ok<T>(value: T): Result<T, never>;
  static ok<T>(value?: T): Result<T | null, never> {
    return new Result<T | null, never>(value === undefined ? null : value, null);
  }

  static error<E>(error: E | null = null): Result<never, E> {
    return new Result<never, E>(null, error, false);
  }

  get value(): T | null {
    return this._value;
  }

  get error(): E | null {
    return this._error;
  }

  get isOk(): boolean {
    return this._isOk;
  }

  get isError(): boolean {
    return !this._isOk;
  }

  /**
   * Structural equality: values must be deeply equal and errors must match.
   * Two errors match when both are absent, or when they share a class,
   * message, cause and own fields even as distinct instances. The variants
   * must match too, so `ok()` never equals `error()`.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Result)) return false;
    return (
      this._isOk === other.isOk &&
      isDeepStrictEqual(this._value, other.value) &&
      errorsEqual(this._error, other.error)
    );
  }

  toString(): string {
    return this._isOk ? `Ok(${display(this._value)})` : `Error(${display(this._error)})`;
  }
}

export function ok(): Result<null, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok<T>(value?: T): Result<T | null, never> {
  return value === undefined ? Result.ok() : Result.ok(value);
}

/**
 * Builds the failure variant. A message string is wrapped in an `Error`.
 *
 * @example
 * error("Not found").equals(error(new Error("Not found"))); // true
 */
export function error(message: string): Result<never, Error>;
export function error<E>(err: E): Result<never, E>;
export function error(): Result<never, never>;
export function error(err?: unknown): Result<never, unknown> {
  if (typeof err === "string") return Result.error(new Error(err));
  return Result.error(err === undefined ? null : err);
}
