import { nanoid } from "nanoid";
import { asIndex } from "./annotations";
import type { FieldGate } from "./access-gate";
import { UsageError } from "./errors";
import { type OperatorHook, OPERATOR_PREFIX } from "./globals";
import {
  type ClassDefinition,
  type FieldKey,
  isCallable,
  privateScopeOf,
  type Scope,
  scopeSymbol,
  storageSymbol
} from "./runtime-types";
import { withScope } from "./scope";

export const normalizeKey = (key: FieldKey): FieldKey => asIndex(key) ?? key;

export class ClassInstance {
  // accessors keep internals out of the enumerable set
  accessor [storageSymbol] = new Map<FieldKey, unknown>();
  accessor [scopeSymbol]: Scope = "public";

  readonly #definition: ClassDefinition;
  readonly #gate: FieldGate;
  #id: string | undefined;

  constructor(definition: ClassDefinition, gate: FieldGate) {
    this.#definition = definition;
    this.#gate = gate;
  }

  get definition(): ClassDefinition {
    return this.#definition;
  }

  get className(): string {
    return this.#definition.name;
  }

  get id(): string {
    return (this.#id ??= nanoid());
  }

  get [Symbol.toStringTag](): string {
    return this.className;
  }

  isA(className: string): boolean {
    return this.#definition.name === className || this.#definition.composition.has(className);
  }

  get(key: FieldKey): unknown {
    return this.#gate.read(this, normalizeKey(key));
  }

  set(key: FieldKey, value: unknown): void {
    this.#gate.write(this, normalizeKey(key), value);
  }

  /** reads `key` through the gate and calls it with this instance as the receiver */
  call(key: FieldKey, ...args: unknown[]): unknown {
    const target = this.get(key);
    if (!isCallable(target)) {
      throw new UsageError(`Field '${key}' of class '${this.className}' is not callable`);
    }
    return target(this, ...args);
  }

  /** declared in the class (at any visibility) or present in this instance's storage */
  has(key: FieldKey): boolean {
    const normalized = normalizeKey(key);
    return (
      (typeof normalized === "string" && this.#definition.fields.has(normalized)) ||
      this[storageSymbol].has(normalized)
    );
  }

  /**
   * Operator hooks are looked up on the class regardless of visibility.
   * The returned function runs the hook in the private scope of the class that declared it.
   */
  operatorHook(hook: OperatorHook): ((...operands: unknown[]) => unknown) | undefined {
    const field = this.#definition.fields.get(`${OPERATOR_PREFIX}${hook}`);
    if (!field?.isOperator) {
      return undefined;
    }
    const handler = this[storageSymbol].get(field.name);
    if (!isCallable(handler)) {
      return undefined;
    }
    const scope = privateScopeOf(field.declaringClass);
    return (...operands) => withScope(this, scope, () => handler(...operands));
  }

  toString(): string {
    const tostring = this.operatorHook("tostring");
    return tostring ? String(tostring(this)) : `${this.className}#${this.id}`;
  }

  [Symbol.toPrimitive](): string {
    return this.toString();
  }

  /** public, non-method fields plus numeric slots and undeclared entries */
  toJSON(): Record<string, unknown> {
    const snapshot: Record<string, unknown> = {};
    for (const [key, value] of this[storageSymbol]) {
      const field = typeof key === "string" ? this.#definition.fields.get(key) : undefined;
      if (!field || (field.visibility === "public" && !field.isMethod && !field.isOperator)) {
        snapshot[key] = value;
      }
    }
    return snapshot;
  }
}
