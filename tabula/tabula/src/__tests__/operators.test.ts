import { describe, expect, it } from "vitest";
import type { ClassInstance } from "../ClassInstance";
import type { ClassRegistry } from "../ClassRegistry";
import { AccessError, DefinitionError, UsageError } from "../errors";
import {
  add,
  concat,
  divide,
  equals,
  invoke,
  lengthOf,
  lessOrEqual,
  lessThan,
  modulo,
  multiply,
  negate,
  power,
  subtract
} from "../operators";
import { asInstance, createTestRegistry } from "./test-registry";

const coordinate = (value: unknown, key: string) => Number(asInstance(value).get(key));

function defineVector(registry: ClassRegistry) {
  registry.defineClass("Vector", [], {
    x: 0,
    y: 0,
    private__label: "vec",
    Vector(self: ClassInstance, x: unknown, y: unknown) {
      self.set("x", x);
      self.set("y", y);
    },
    operator__add: (left: unknown, right: unknown) =>
      registry.create(
        "Vector",
        coordinate(left, "x") + coordinate(right, "x"),
        coordinate(left, "y") + coordinate(right, "y")
      ),
    operator__unm: (self: unknown) => registry.create("Vector", -coordinate(self, "x"), -coordinate(self, "y")),
    operator__eq: (left: unknown, right: unknown) =>
      coordinate(left, "x") === coordinate(right, "x") && coordinate(left, "y") === coordinate(right, "y"),
    operator__concat: (left: unknown, right: unknown) => `${String(asInstance(left).get("label"))}${String(right)}`,
    operator__len: () => 2,
    operator__call: (self: unknown, key: unknown) => asInstance(self).get(String(key)),
    operator__tostring: (self: unknown) => `(${coordinate(self, "x")}, ${coordinate(self, "y")})`
  });
}

describe("Operator hooks", () => {
  it("dispatch arithmetic to the left operand's hook", () => {
    const { registry } = createTestRegistry();
    defineVector(registry);
    const sum = add(registry.create("Vector", 1, 2), registry.create("Vector", 3, 4));

    expect(String(sum)).toBe("(4, 6)");
  });

  it("fall back to the right operand's hook", () => {
    const { registry } = createTestRegistry();
    registry.defineClass("Money", [], {
      amount: 0,
      Money(self: ClassInstance, amount: unknown) {
        self.set("amount", amount);
      },
      operator__mul: (left: unknown, right: unknown) =>
        typeof left === "number"
          ? registry.create("Money", left * coordinate(right, "amount"))
          : registry.create("Money", coordinate(left, "amount") * Number(right))
    });
    const price = registry.create("Money", 3);

    expect(coordinate(multiply(2, price), "amount")).toBe(6);
    expect(coordinate(multiply(price, 4), "amount")).toBe(12);
  });

  it("run in the private scope of the declaring class", () => {
    const { registry } = createTestRegistry();
    defineVector(registry);
    const vector = registry.create("Vector", 1, 2);

    expect(concat(vector, "!")).toBe("vec!");
    expect(() => vector.get("label")).toThrow(AccessError);
  });

  it("cover unary minus, length, calls and printing", () => {
    const { registry } = createTestRegistry();
    defineVector(registry);
    const vector = registry.create("Vector", 1, 2);

    expect(`${asInstance(negate(vector))}`).toBe("(-1, -2)");
    expect(lengthOf(vector)).toBe(2);
    expect(invoke(vector, "y")).toBe(2);
    expect(`${vector}`).toBe("(1, 2)");
  });

  it("compare through eq only when both sides are instances", () => {
    const { registry } = createTestRegistry();
    defineVector(registry);
    const vector = registry.create("Vector", 1, 2);

    expect(equals(vector, registry.create("Vector", 1, 2))).toBe(true);
    expect(equals(vector, registry.create("Vector", 2, 1))).toBe(false);
    expect(equals(vector, 3)).toBe(false);
  });

  it("derive less-or-equal from less-than", () => {
    const { registry } = createTestRegistry();
    registry.defineClass("Score", [], {
      points: 0,
      Score(self: ClassInstance, points: unknown) {
        self.set("points", points);
      },
      operator__lt: (left: unknown, right: unknown) => coordinate(left, "points") < coordinate(right, "points")
    });
    const low = registry.create("Score", 1);
    const high = registry.create("Score", 2);

    expect(lessThan(low, high)).toBe(true);
    expect(lessOrEqual(low, high)).toBe(true);
    expect(lessOrEqual(high, low)).toBe(false);
    expect(lessOrEqual(low, registry.create("Score", 1))).toBe(true);
  });

  it("are constant", () => {
    const { registry } = createTestRegistry();
    defineVector(registry);

    expect(() => registry.create("Vector", 0, 0).set("__add", () => null)).toThrow(
      "Trying to overwrite a method '__add' of class 'Vector'"
    );
  });

  it("can be declared under their stored name", () => {
    const { registry } = createTestRegistry();
    registry.defineClass("Meters", [], {
      value: 0,
      Meters(self: ClassInstance, value: unknown) {
        self.set("value", value);
      },
      __add: (left: unknown, right: unknown) => coordinate(left, "value") + coordinate(right, "value")
    });

    expect(add(registry.create("Meters", 2), registry.create("Meters", 3))).toBe(5);
    expect(() => registry.defineClass("Twice", [], { operator__add: () => 0, __add: () => 0 })).toThrow(
      "Duplicate field '__add' in class 'Twice'"
    );
  });

  it("must be functions", () => {
    const { registry } = createTestRegistry();

    expect(() => registry.defineClass("Bad", [], { operator__add: 5 })).toThrow(DefinitionError);
    expect(() => registry.defineClass("Bad", [], { operator__add: 5 })).toThrow(
      "Operator '__add' of class 'Bad' must be a function"
    );
  });
});

describe("Native fallbacks", () => {
  it("use plain arithmetic on numbers", () => {
    expect(add(2, 3)).toBe(5);
    expect(subtract(2, 3)).toBe(-1);
    expect(divide(3, 2)).toBe(1.5);
    expect(power(2, 10)).toBe(1024);
    expect(modulo(-1, 3)).toBe(2);
  });

  it("concatenate strings and numbers", () => {
    expect(concat("a", 1)).toBe("a1");
  });

  it("compare numbers and strings", () => {
    expect(lessThan(1, 2)).toBe(true);
    expect(lessOrEqual("b", "a")).toBe(false);
  });

  it("measure consecutive numeric slots of instances without a len hook", () => {
    const { registry } = createTestRegistry();
    registry.defineClass("List", [], { 0: "a", 1: "b", 3: "d" });

    expect(lengthOf(registry.create("List"))).toBe(2);
    expect(lengthOf("abc")).toBe(3);
  });

  it("refuse mixed operands", () => {
    expect(() => add("a", 1)).toThrow("Cannot add string and number");
    expect(() => lessThan(1, "2")).toThrow(UsageError);
    expect(() => invoke(() => 1)).toThrow("Cannot call function");
  });
});
