import type { ClassInstance } from "./ClassInstance";

export const storageSymbol = Symbol("field storage");
export const scopeSymbol = Symbol("current scope");

/** Default that always resolves to `undefined` and always wins while merging parents. */
export const HardAbsent: unique symbol = Symbol("hard absent");
/** Default that resolves to `undefined` unless another parent supplies a concrete value. */
export const SoftAbsent: unique symbol = Symbol("soft absent");

export type AbsentSentinel = typeof HardAbsent | typeof SoftAbsent;

export type FieldKey = string | number;

export type PrivateScope = `private:${string}`;
export type Visibility = "public" | "protected" | PrivateScope;
export type Scope = "public" | PrivateScope;

export type Method = (self: ClassInstance, ...args: unknown[]) => unknown;
export type Factory = () => unknown;

export type ClassBody = Record<string, unknown>;

export type FieldDefinition = {
  readonly name: string;
  readonly visibility: Visibility;
  readonly defaultValue: unknown;
  readonly isConstant: boolean;
  readonly isSharedReference: boolean;
  readonly isLazyInstance: boolean;
  readonly isMethod: boolean;
  /** a function-valued field that stays raw and writable */
  readonly isNonMethod: boolean;
  readonly isOperator: boolean;
  /** class whose body (or merge) placed the current default; methods run in its private scope */
  readonly declaringClass: string;
};

export type SuperReference = ((self: ClassInstance, ...args: unknown[]) => unknown) & {
  readonly className: string;
  readonly methods: Readonly<Record<string, Method>>;
};

export type ClassDefinition = {
  readonly kind: "class";
  readonly name: string;
  readonly fields: ReadonlyMap<string, FieldDefinition>;
  readonly indexedDefaults: ReadonlyMap<number, unknown>;
  /** every ancestor, excluding the class itself */
  readonly composition: ReadonlySet<string>;
  readonly directParents: readonly string[];
  readonly superReference: SuperReference;
};

export type ExternalAdapterDefinition = {
  readonly kind: "adapter";
  readonly name: string;
  readonly factory: (...args: unknown[]) => unknown;
};

export type RegisteredDefinition = ClassDefinition | ExternalAdapterDefinition;

export const privateScopeOf = (className: string): PrivateScope => `private:${className}`;

export const isPrivateVisibility = (visibility: Visibility): visibility is PrivateScope =>
  visibility.startsWith("private:");

export const isAbsentSentinel = (value: unknown): value is AbsentSentinel =>
  value === HardAbsent || value === SoftAbsent;

export const isSuperReference = (value: unknown): value is SuperReference =>
  typeof value === "function" && "className" in value && "methods" in value;

export const isCallable = (value: unknown): value is (...args: unknown[]) => unknown =>
  typeof value === "function";
