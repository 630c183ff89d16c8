import { describe, it, expect, vi } from "vitest";
import type { JsonStrategy } from "../src/contract/index.js";
import { identifierFieldNames, quotedFieldNames } from "../src/encoding/index.js";
import { UnresolvedTypeError } from "../src/errors/index.js";
import {
  ResolutionContext,
  ancestorsOf,
  defineCapability,
  describeType,
  implementCapability,
  typeKeyOf,
  useJsonStrategy,
} from "../src/resolution/index.js";

const strategy = (label: string): JsonStrategy & { label: string } => ({
  label,
  serialize: (_value, writer) => writer.writeLiteral(JSON.stringify(label)),
});

describe("typeKeyOf", () => {
  it("uses typeof for primitives", () => {
    expect(typeKeyOf("x")).toBe("string");
    expect(typeKeyOf(1)).toBe("number");
    expect(typeKeyOf(true)).toBe("boolean");
    expect(typeKeyOf(1n)).toBe("bigint");
    expect(typeKeyOf(undefined)).toBe("undefined");
    expect(typeKeyOf(() => 1)).toBe("function");
  });

  it("uses the prototype's constructor for objects", () => {
    class Point {}
    expect(typeKeyOf(new Point())).toBe(Point);
    expect(typeKeyOf([])).toBe(Array);
    expect(typeKeyOf({})).toBe(Object);
    expect(typeKeyOf(new Map())).toBe(Map);
  });

  it("treats null-prototype objects as Object", () => {
    expect(typeKeyOf(Object.create(null))).toBe(Object);
  });
});

describe("describeType", () => {
  it("names primitives, classes and capabilities", () => {
    class Widget {}
    expect(describeType("number")).toBe("number");
    expect(describeType(Widget)).toBe("Widget");
    expect(describeType(defineCapability("Named"))).toBe("capability Named");
  });
});

describe("ResolutionContext", () => {
  it("resolves explicit registrations", () => {
    const numbers = strategy("numbers");
    const context = new ResolutionContext().register("number", numbers);

    expect(context.resolve("number")).toBe(numbers);
    expect(context.resolveFor(42)).toBe(numbers);
  });

  it("throws UnresolvedTypeError when nothing applies", () => {
    class Orphan {}
    const context = new ResolutionContext();

    expect(() => context.resolve(Orphan)).toThrow(UnresolvedTypeError);
    expect(() => context.resolve(Orphan)).toThrow(
      "No JSON strategy applies to type Orphan"
    );
    expect(context.tryResolve(Orphan)).toEqual({
      success: false,
      error: undefined,
    });
  });

  it("uses a marker attached directly to the type", () => {
    class Money {}
    const money = strategy("money");
    useJsonStrategy(Money, money);

    expect(new ResolutionContext().resolve(Money)).toBe(money);
  });

  it("prefers explicit registration over a marker", () => {
    class Temperature {}
    const marked = strategy("marked");
    const registered = strategy("registered");
    useJsonStrategy(Temperature, marked);

    const context = new ResolutionContext().register(Temperature, registered);

    expect(context.resolve(Temperature)).toBe(registered);
  });

  it("applies an inherited marker on a base class to subclasses", () => {
    class Shape {}
    class Polygon extends Shape {}
    class Square extends Polygon {}
    const shapes = strategy("shapes");
    useJsonStrategy(Shape, shapes, { inherited: true });

    const context = new ResolutionContext();

    expect(context.resolve(Polygon)).toBe(shapes);
    expect(context.resolve(Square)).toBe(shapes);
  });

  it("does not apply a non-inherited marker to subclasses", () => {
    class Account {}
    class SavingsAccount extends Account {}
    useJsonStrategy(Account, strategy("accounts"));

    expect(() => new ResolutionContext().resolve(SavingsAccount)).toThrow(
      UnresolvedTypeError
    );
  });

  it("falls back when a non-inherited marker does not reach a subclass", () => {
    class Ledger {}
    class SubLedger extends Ledger {}
    const fallback = strategy("fallback");
    useJsonStrategy(Ledger, strategy("ledgers"));

    const context = new ResolutionContext().setFallback(fallback);

    expect(context.resolve(SubLedger)).toBe(fallback);
  });

  it("prefers a direct marker over an inherited one", () => {
    class Animal {}
    class Cat extends Animal {}
    const animals = strategy("animals");
    const cats = strategy("cats");
    useJsonStrategy(Animal, animals, { inherited: true });
    useJsonStrategy(Cat, cats);

    expect(new ResolutionContext().resolve(Cat)).toBe(cats);
  });

  it("prefers the nearest inherited superclass marker", () => {
    class Vehicle {}
    class Car extends Vehicle {}
    class SportsCar extends Car {}
    const vehicles = strategy("vehicles");
    const cars = strategy("cars");
    useJsonStrategy(Vehicle, vehicles, { inherited: true });
    useJsonStrategy(Car, cars, { inherited: true });

    expect(new ResolutionContext().resolve(SportsCar)).toBe(cars);
  });

  it("finds inherited markers on capabilities", () => {
    const Identified = defineCapability<{ id: string }>("Identified");
    class User {
      id = "u1";
    }
    class Admin extends User {}
    const identified = strategy("identified");
    implementCapability(User, Identified);
    useJsonStrategy(Identified, identified, { inherited: true });

    const context = new ResolutionContext();

    expect(context.resolve(User)).toBe(identified);
    expect(context.resolve(Admin)).toBe(identified);
  });

  it("checks superclasses before capabilities", () => {
    const Auditable = defineCapability("Auditable");
    class Entity {}
    class Invoice extends Entity {}
    const entities = strategy("entities");
    implementCapability(Invoice, Auditable);
    useJsonStrategy(Auditable, strategy("auditable"), { inherited: true });
    useJsonStrategy(Entity, entities, { inherited: true });

    expect(new ResolutionContext().resolve(Invoice)).toBe(entities);
  });

  it("follows capabilities that extend other capabilities", () => {
    const Named = defineCapability("Named");
    const Titled = defineCapability("Titled", Named);
    class Book {}
    const named = strategy("named");
    implementCapability(Book, Titled);
    useJsonStrategy(Named, named, { inherited: true });

    expect(new ResolutionContext().resolve(Book)).toBe(named);
  });

  it("ignores non-inherited capability markers", () => {
    const Sealed = defineCapability("Sealed");
    class Vault {}
    implementCapability(Vault, Sealed);
    useJsonStrategy(Sealed, strategy("sealed"));

    expect(() => new ResolutionContext().resolve(Vault)).toThrow(
      UnresolvedTypeError
    );
  });

  it("uses the fallback for primitives without registrations", () => {
    const fallback = strategy("fallback");
    const context = new ResolutionContext().setFallback(fallback);

    expect(context.resolve("symbol")).toBe(fallback);
  });

  it("returns the same strategy on repeated resolution", () => {
    class Sample {}
    const samples = strategy("samples");
    useJsonStrategy(Sample, samples, { inherited: true });
    class SubSample extends Sample {}
    const context = new ResolutionContext();

    const first = context.resolve(SubSample);
    const second = context.resolve(SubSample);

    expect(first).toBe(samples);
    expect(second).toBe(first);
  });

  it("lets a later registration override a cached resolution", () => {
    class Report {}
    const fallback = strategy("fallback");
    const reports = strategy("reports");
    const context = new ResolutionContext().setFallback(fallback);

    expect(context.resolve(Report)).toBe(fallback);
    context.register(Report, reports);
    expect(context.resolve(Report)).toBe(reports);
  });

  it("logs cache fills when debug is on", () => {
    class Traced {}
    const log = vi.fn();
    const context = new ResolutionContext({ debug: true, log }).setFallback(
      strategy("fallback")
    );

    context.resolve(Traced);
    context.resolve(Traced);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("resolve Traced: fallback via Traced");
  });

  it("stays quiet when debug is off", () => {
    const log = vi.fn();
    const context = new ResolutionContext({ log }).register(
      "string",
      strategy("strings")
    );

    context.resolve("string");

    expect(log).not.toHaveBeenCalled();
  });

  it("picks the field name encoder from configuration", () => {
    expect(new ResolutionContext().fieldNameEncoder).toBe(quotedFieldNames);
    expect(
      new ResolutionContext({ fieldNames: "identifier" }).fieldNameEncoder
    ).toBe(identifierFieldNames);

    const custom = { encode: (name: string) => `<${name}>` };
    expect(
      new ResolutionContext({ fieldNameEncoder: custom }).fieldNameEncoder
    ).toBe(custom);
  });

  it("rejects invalid configuration", () => {
    expect(
      () =>
        new ResolutionContext({
          fieldNames: "bare" as unknown as "quoted",
        })
    ).toThrow();
  });
});

describe("ancestorsOf", () => {
  it("lists superclasses nearest first, then capabilities breadth-first", () => {
    const A = defineCapability("A");
    const B = defineCapability("B", A);
    const C = defineCapability("C");
    class Base {}
    class Middle extends Base {}
    class Leaf extends Middle {}
    implementCapability(Leaf, B);
    implementCapability(Base, C);

    expect([...ancestorsOf(Leaf)]).toEqual([Middle, Base, B, C, A]);
  });
});
