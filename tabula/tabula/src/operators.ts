import { ClassInstance } from "./ClassInstance";
import { UsageError } from "./errors";
import type { OperatorHook } from "./globals";
import { storageSymbol } from "./runtime-types";

export type ArithmeticHook = Extract<OperatorHook, "add" | "sub" | "mul" | "div" | "mod" | "pow">;

const nativeArithmetic: Record<ArithmeticHook, (left: number, right: number) => number> = {
  add: (left, right) => left + right,
  sub: (left, right) => left - right,
  mul: (left, right) => left * right,
  div: (left, right) => left / right,
  // floored, so the sign follows the divisor
  mod: (left, right) => left - Math.floor(left / right) * right,
  pow: (left, right) => left ** right
};

const describeOperand = (value: unknown) => (value instanceof ClassInstance ? `instance of '${value.className}'` : typeof value);

/** the left operand's hook wins; the right operand's is the fallback */
function binaryHook(hook: OperatorHook, left: unknown, right: unknown) {
  return (
    (left instanceof ClassInstance ? left.operatorHook(hook) : undefined) ??
    (right instanceof ClassInstance ? right.operatorHook(hook) : undefined)
  );
}

export function arithmetic(hook: ArithmeticHook, left: unknown, right: unknown): unknown {
  const handler = binaryHook(hook, left, right);
  if (handler) {
    return handler(left, right);
  }
  if (typeof left === "number" && typeof right === "number") {
    return nativeArithmetic[hook](left, right);
  }
  throw new UsageError(`Cannot ${hook} ${describeOperand(left)} and ${describeOperand(right)}`);
}

export const add = (left: unknown, right: unknown) => arithmetic("add", left, right);
export const subtract = (left: unknown, right: unknown) => arithmetic("sub", left, right);
export const multiply = (left: unknown, right: unknown) => arithmetic("mul", left, right);
export const divide = (left: unknown, right: unknown) => arithmetic("div", left, right);
export const modulo = (left: unknown, right: unknown) => arithmetic("mod", left, right);
export const power = (left: unknown, right: unknown) => arithmetic("pow", left, right);

export function concat(left: unknown, right: unknown): unknown {
  const handler = binaryHook("concat", left, right);
  if (handler) {
    return handler(left, right);
  }
  if ((typeof left === "string" || typeof left === "number") && (typeof right === "string" || typeof right === "number")) {
    return `${left}${right}`;
  }
  throw new UsageError(`Cannot concat ${describeOperand(left)} and ${describeOperand(right)}`);
}

export function negate(operand: unknown): unknown {
  const handler = operand instanceof ClassInstance ? operand.operatorHook("unm") : undefined;
  if (handler) {
    return handler(operand);
  }
  if (typeof operand === "number") {
    return -operand;
  }
  throw new UsageError(`Cannot negate ${describeOperand(operand)}`);
}

/** `len` hook, else the number of consecutive numeric slots from 0 */
export function lengthOf(operand: unknown): unknown {
  if (operand instanceof ClassInstance) {
    const handler = operand.operatorHook("len");
    if (handler) {
      return handler(operand);
    }
    const storage = operand[storageSymbol];
    let length = 0;
    while (storage.has(length)) {
      length++;
    }
    return length;
  }
  if (typeof operand === "string" || Array.isArray(operand)) {
    return operand.length;
  }
  throw new UsageError(`Cannot take the length of ${describeOperand(operand)}`);
}

export function equals(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (!(left instanceof ClassInstance) || !(right instanceof ClassInstance)) {
    return false;
  }
  const handler = binaryHook("eq", left, right);
  return handler ? Boolean(handler(left, right)) : false;
}

function compareNatively(left: unknown, right: unknown, orEqual: boolean): boolean | undefined {
  if (typeof left === "number" && typeof right === "number") {
    return orEqual ? left <= right : left < right;
  }
  if (typeof left === "string" && typeof right === "string") {
    return orEqual ? left <= right : left < right;
  }
  return undefined;
}

export function lessThan(left: unknown, right: unknown): boolean {
  const handler = binaryHook("lt", left, right);
  if (handler) {
    return Boolean(handler(left, right));
  }
  const result = compareNatively(left, right, false);
  if (result === undefined) {
    throw new UsageError(`Cannot compare ${describeOperand(left)} with ${describeOperand(right)}`);
  }
  return result;
}

export function lessOrEqual(left: unknown, right: unknown): boolean {
  const handler = binaryHook("le", left, right);
  if (handler) {
    return Boolean(handler(left, right));
  }
  if (binaryHook("lt", left, right)) {
    return !lessThan(right, left);
  }
  const result = compareNatively(left, right, true);
  if (result === undefined) {
    throw new UsageError(`Cannot compare ${describeOperand(left)} with ${describeOperand(right)}`);
  }
  return result;
}

/** calls an instance through its `call` hook, which receives the instance first */
export function invoke(target: unknown, ...args: unknown[]): unknown {
  const handler = target instanceof ClassInstance ? target.operatorHook("call") : undefined;
  if (!handler) {
    throw new UsageError(`Cannot call ${describeOperand(target)}`);
  }
  return handler(target, ...args);
}
