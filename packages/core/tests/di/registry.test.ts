import "reflect-metadata";
import { describe, it, expect, beforeEach, vi } from "vitest";
import { Registry } from "../../src/di/registry";
import { InterfaceToken } from "../../src/di/token";
import { REGISTRY } from "../../src/di/tokens";
import { Injectable, Inject } from "../../src/decorators/injectable";
import { CircularDependencyError, UnboundInterfaceError } from "../../src/errors/di-errors";

// ---------------------------------------------------------------------------
// Test services
// ---------------------------------------------------------------------------

abstract class Greeter {
  abstract greet(name: string): string;
}

class EnglishGreeter extends Greeter {
  greet(name: string): string {
    return `Hello, ${name}`;
  }
}

class SpanishGreeter extends Greeter {
  greet(name: string): string {
    return `Hola, ${name}`;
  }
}

class Clock {
  now(): number {
    return 0;
  }
}

const PORT = new InterfaceToken<number>("Port");

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Registry", () => {
  let registry: Registry;

  beforeEach(() => {
    registry = new Registry();
  });

  // -----------------------------------------------------------------------
  // bind / get
  // -----------------------------------------------------------------------

  describe("bind", () => {
    it("should resolve an abstract interface to an instance of its implementation", () => {
      // Arrange
      registry.bind(Greeter, EnglishGreeter);

      // Act
      const greeter = registry.get(Greeter);

      // Assert
      expect(greeter).toBeInstanceOf(EnglishGreeter);
      expect(greeter.greet("Ada")).toBe("Hello, Ada");
    });

    it("should return the same instance on every get", () => {
      // Arrange
      registry.bind(Greeter, EnglishGreeter);

      // Act
      const first = registry.get(Greeter);
      const second = registry.get(Greeter);

      // Assert
      expect(second).toBe(first);
    });

    it("should let the last binding win and drop the cached instance", () => {
      // Arrange
      registry.bind(Greeter, EnglishGreeter);
      const before = registry.get(Greeter);

      // Act
      registry.bind(Greeter, SpanishGreeter);
      const after = registry.get(Greeter);

      // Assert
      expect(before).toBeInstanceOf(EnglishGreeter);
      expect(after).toBeInstanceOf(SpanishGreeter);
      expect(registry.bindings.get(Greeter)).toEqual({ useClass: SpanishGreeter });
    });

    it("should return the registry for chaining", () => {
      // Act
      const result = registry.bind(Greeter, EnglishGreeter).bind(PORT, { useValue: 8080 });

      // Assert
      expect(result).toBe(registry);
      expect(registry.get(PORT)).toBe(8080);
    });

    it("should call a factory provider once under singleton scope", () => {
      // Arrange
      const factory = vi.fn(() => new Clock());
      registry.bind(Clock, { useFactory: factory });

      // Act
      const first = registry.get(Clock);
      const second = registry.get(Clock);

      // Assert
      expect(factory).toHaveBeenCalledTimes(1);
      expect(second).toBe(first);
    });

    it("should pass resolved inject keys to a factory provider", () => {
      // Arrange
      registry.bind(PORT, { useValue: 3000 });
      const URL_TOKEN = new InterfaceToken<string>("Url");
      registry.bind(URL_TOKEN, {
        useFactory: (port: number) => `http://localhost:${port}`,
        inject: [PORT],
      });

      // Act
      const url = registry.get(URL_TOKEN);

      // Assert
      expect(url).toBe("http://localhost:3000");
    });

    it("should accept string and symbol keys", () => {
      // Arrange
      const SYMBOL_KEY = Symbol("answer");
      registry.bind("greeting", { useValue: "hi" });
      registry.bind(SYMBOL_KEY, { useValue: 42 });

      // Act & Assert
      expect(registry.get<string>("greeting")).toBe("hi");
      expect(registry.get<number>(SYMBOL_KEY)).toBe(42);
    });

    it("should keep two tokens with the same name apart", () => {
      // Arrange
      const first = new InterfaceToken<string>("Name");
      const second = new InterfaceToken<string>("Name");
      registry.bind(first, { useValue: "first" });

      // Act & Assert
      expect(registry.get(first)).toBe("first");
      expect(registry.has(second)).toBe(false);
    });
  });

  // -----------------------------------------------------------------------
  // scopes
  // -----------------------------------------------------------------------

  describe("transient scope", () => {
    it("should build a new instance on every get", () => {
      // Arrange
      registry.bind(Clock, { useClass: Clock, scope: "transient" });

      // Act
      const first = registry.get(Clock);
      const second = registry.get(Clock);

      // Assert
      expect(first).toBeInstanceOf(Clock);
      expect(second).not.toBe(first);
    });

    it("should apply the registry default scope to providers without one", () => {
      // Arrange
      const transientRegistry = new Registry({ defaultScope: "transient" });
      transientRegistry.add(Clock);
      transientRegistry.bind(PORT, { useValue: 1 });

      // Act & Assert
      expect(transientRegistry.get(Clock)).not.toBe(transientRegistry.get(Clock));
      expect(transientRegistry.get(PORT)).toBe(1);
    });
  });

  // -----------------------------------------------------------------------
  // add / bindAll
  // -----------------------------------------------------------------------

  describe("add", () => {
    it("should bind a class to itself", () => {
      // Act
      registry.add(Clock);

      // Assert
      expect(registry.get(Clock)).toBeInstanceOf(Clock);
      expect(registry.bindings.get(Clock)).toEqual({ useClass: Clock });
    });
  });

  describe("bindAll", () => {
    it("should bind pairs, provide objects and bare classes in order", () => {
      // Act
      registry.bindAll(
        [Greeter, EnglishGreeter],
        { provide: PORT, useValue: 9000 },
        Clock,
        [Greeter, SpanishGreeter],
      );

      // Assert
      expect(registry.get(Greeter)).toBeInstanceOf(SpanishGreeter);
      expect(registry.get(PORT)).toBe(9000);
      expect(registry.get(Clock)).toBeInstanceOf(Clock);
      expect([...registry.bindings.keys()]).toEqual([Greeter, PORT, Clock]);
    });
  });

  // -----------------------------------------------------------------------
  // has / bindings / REGISTRY
  // -----------------------------------------------------------------------

  describe("has", () => {
    it("should report bound and unbound keys", () => {
      // Arrange
      registry.add(Clock);

      // Act & Assert
      expect(registry.has(Clock)).toBe(true);
      expect(registry.has(Greeter)).toBe(false);
    });
  });

  describe("REGISTRY", () => {
    it("should resolve to the registry itself without appearing in bindings", () => {
      // Act & Assert
      expect(registry.get(REGISTRY)).toBe(registry);
      expect(registry.has(REGISTRY)).toBe(true);
      expect(registry.bindings.size).toBe(0);
    });
  });

  // -----------------------------------------------------------------------
  // invoke
  // -----------------------------------------------------------------------

  describe("invoke", () => {
    it("should build a fresh value without caching it", () => {
      // Arrange
      registry.add(Clock);
      const cached = registry.get(Clock);

      // Act
      const fresh = registry.invoke(Clock);

      // Assert
      expect(fresh).toBeInstanceOf(Clock);
      expect(fresh).not.toBe(cached);
      expect(registry.get(Clock)).toBe(cached);
    });

    it("should accept provider objects", () => {
      // Act & Assert
      expect(registry.invoke({ useValue: "v" })).toBe("v");
      expect(registry.invoke({ useFactory: () => 7 })).toBe(7);
    });
  });

  // -----------------------------------------------------------------------
  // failures
  // -----------------------------------------------------------------------

  describe("errors", () => {
    it("should throw UnboundInterfaceError for an unbound key", () => {
      // Act & Assert
      expect(() => registry.get(Greeter)).toThrow(UnboundInterfaceError);
      expect(() => registry.get(PORT)).toThrow(
        'No provider bound for Port.\nBind one with bind(), or list it in the "providers" of a registered module.',
      );
    });

    it("should propagate a provider failure unchanged and cache nothing", () => {
      // Arrange
      const failure = new Error("boom");
      const factory = vi.fn((): Clock => {
        throw failure;
      });
      registry.bind(Clock, { useFactory: factory });

      // Act & Assert
      expect(() => registry.get(Clock)).toThrow(failure);
      expect(() => registry.get(Clock)).toThrow(failure);
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it("should detect circular dependencies", () => {
      // Arrange
      const A = new InterfaceToken<unknown>("A");
      const B = new InterfaceToken<unknown>("B");
      registry.bind(A, { useFactory: (b: unknown) => ({ b }), inject: [B] });
      registry.bind(B, { useFactory: (a: unknown) => ({ a }), inject: [A] });

      // Act & Assert
      expect(() => registry.get(A)).toThrow(CircularDependencyError);
      expect(() => registry.get(A)).toThrow("Circular dependency detected: A → B → A");
    });

    it("should detect a class that depends on itself", () => {
      // Arrange
      const SELF = new InterfaceToken<unknown>("Self");

      @Injectable()
      class Recursive {
        constructor(@Inject(SELF) public self: unknown) {}
      }
      registry.bind(SELF, Recursive);

      // Act & Assert
      expect(() => registry.get(SELF)).toThrow("Circular dependency detected: Self → Self");
    });
  });
});
