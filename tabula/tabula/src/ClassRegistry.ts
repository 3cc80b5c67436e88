import invariant from "tiny-invariant";
import { createFieldGate, type FieldGate } from "./access-gate";
import { ClassInstance } from "./ClassInstance";
import { deepCopy } from "./clone";
import { type RegistryConfig, type RegistryConfigInput, resolveRegistryConfig } from "./config";
import { buildClassDefinition } from "./definition";
import { DefinitionError, UsageError } from "./errors";
import {
  type ClassBody,
  type ClassDefinition,
  type ExternalAdapterDefinition,
  type FieldDefinition,
  isAbsentSentinel,
  isCallable,
  type RegisteredDefinition,
  storageSymbol
} from "./runtime-types";

/**
 * Process-wide home of class definitions.
 *
 * Create one per host (or per test) and keep it; definitions are only ever added.
 * Registration is single-writer: two overlapping defineClass calls for the same name are not arbitrated,
 * the registry only guarantees that a definition that throws is never stored.
 */
export class ClassRegistry {
  readonly config: RegistryConfig;
  readonly #definitions = new Map<string, RegisteredDefinition>();
  readonly #adapterProducts = new WeakMap<object, string>();
  readonly #gate: FieldGate;

  constructor(config?: RegistryConfigInput) {
    this.config = resolveRegistryConfig(config);
    this.#gate = createFieldGate(this.config);
  }

  hasClass(name: string): boolean {
    return this.#definitions.has(name);
  }

  getDefinition(name: string): RegisteredDefinition | undefined {
    return this.#definitions.get(name);
  }

  classNames(): string[] {
    return [...this.#definitions.keys()];
  }

  defineClass(name: string, parents: readonly string[], body: ClassBody): ClassDefinition {
    this.#assertNameAvailable(name);
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new DefinitionError(`Body of class '${name}' must be a plain object`);
    }
    // untyped callers can hand over a bare string, which would otherwise be walked character by character
    const parentList: unknown = parents;
    if (!Array.isArray(parentList)) {
      throw new UsageError(`Parents of class '${name}' must be a list of class names, got ${typeof parents}`);
    }
    const resolvedParents: ClassDefinition[] = [];
    for (const parentName of parents) {
      if (typeof parentName !== "string") {
        throw new UsageError(`Class '${name}' lists a parent of type ${typeof parentName}; parents are class names`);
      }
      const parent = this.#definitions.get(parentName);
      if (!parent) {
        throw new DefinitionError(`Trying to inherit from a class that hasn't been defined ('${parentName}')`);
      }
      if (parent.kind === "adapter") {
        throw new DefinitionError(`Class '${name}' cannot inherit from external adapter '${parentName}'`);
      }
      if (resolvedParents.includes(parent)) {
        throw new DefinitionError(`Class '${name}' lists parent '${parentName}' more than once`);
      }
      resolvedParents.push(parent);
    }

    const definition = buildClassDefinition({
      name,
      parents: resolvedParents,
      body,
      resolveAncestor: (ancestorName) => {
        const ancestor = this.#definitions.get(ancestorName);
        invariant(ancestor?.kind === "class", `ancestor '${ancestorName}' of '${name}' is not a registered class`);
        return ancestor;
      },
      logger: this.config.logger
    });
    this.#definitions.set(name, definition);
    this.config.logger.debug(`defined class '${name}'`, { parents: definition.directParents });
    return definition;
  }

  /** lets an opaque constructor be reached through instantiate(); it can never be inherited from */
  defineExternalAdapter(name: string, factory: (...args: unknown[]) => unknown): ExternalAdapterDefinition {
    this.#assertNameAvailable(name);
    if (!isCallable(factory)) {
      throw new DefinitionError(`External adapter '${name}' needs a factory function`);
    }
    const definition: ExternalAdapterDefinition = Object.freeze({ kind: "adapter", name, factory });
    this.#definitions.set(name, definition);
    this.config.logger.debug(`defined external adapter '${name}'`);
    return definition;
  }

  /** Builds an instance of a class, or whatever an external adapter's factory returns. */
  instantiate(name: string, ...args: unknown[]): unknown {
    const definition = this.#definitions.get(name);
    if (!definition) {
      throw new DefinitionError(`Class '${String(name)}' has not been defined`);
    }
    if (definition.kind === "adapter") {
      const product = definition.factory(...args);
      if ((typeof product === "object" && product !== null) || typeof product === "function") {
        this.#adapterProducts.set(product, name);
      }
      return product;
    }
    return this.#construct(definition, args);
  }

  /** instantiate() for names that must be classes */
  create(name: string, ...args: unknown[]): ClassInstance {
    const definition = this.#definitions.get(name);
    if (!definition) {
      throw new DefinitionError(`Class '${String(name)}' has not been defined`);
    }
    if (definition.kind === "adapter") {
      throw new UsageError(`'${name}' is an external adapter; use instantiate() for it`);
    }
    return this.#construct(definition, args);
  }

  /** refills every declared field from its default, then runs the constructor again */
  reset(instance: ClassInstance, ...args: unknown[]): void {
    if (!(instance instanceof ClassInstance) || this.#definitions.get(instance.className) !== instance.definition) {
      throw new UsageError("reset() needs an instance created by this registry");
    }
    this.#populate(instance);
    this.#runConstructor(instance, args);
  }

  isSubtype(child: unknown, parent: unknown): boolean {
    const childName = this.#nameOf(child);
    const parentName = this.#nameOf(parent);
    if (childName === undefined || parentName === undefined) {
      return false;
    }
    if (childName === parentName) {
      return true;
    }
    const definition = this.#definitions.get(childName);
    return definition?.kind === "class" && definition.composition.has(parentName);
  }

  getClassName(value: unknown): string {
    if (typeof value !== "string") {
      const name = this.#nameOf(value);
      if (name !== undefined) {
        return name;
      }
    }
    throw new UsageError(`Cannot get the class name of ${typeof value} value; it is not an instance`);
  }

  #assertNameAvailable(name: string) {
    if (typeof name !== "string" || name === "") {
      throw new DefinitionError(`Class name must be a non-empty string, got ${typeof name}`);
    }
    if (this.#definitions.has(name)) {
      throw new DefinitionError(`Class '${name}' is already defined`);
    }
  }

  #nameOf(value: unknown): string | undefined {
    if (typeof value === "string") {
      return value;
    }
    if (value instanceof ClassInstance) {
      return value.className;
    }
    if ((typeof value === "object" && value !== null) || typeof value === "function") {
      return this.#adapterProducts.get(value);
    }
    return undefined;
  }

  #construct(definition: ClassDefinition, args: unknown[]): ClassInstance {
    const instance = new ClassInstance(definition, this.#gate);
    this.#populate(instance);
    this.#runConstructor(instance, args);
    return instance;
  }

  #populate(instance: ClassInstance) {
    const storage = instance[storageSymbol];
    // one identity map per instance: defaults sharing a sub-structure keep sharing it in the copy
    const mapping = new WeakMap<object, unknown>();
    for (const field of instance.definition.fields.values()) {
      storage.set(field.name, this.#materializeDefault(field, mapping));
    }
    for (const [index, value] of instance.definition.indexedDefaults) {
      storage.set(index, isAbsentSentinel(value) ? undefined : deepCopy(value, mapping));
    }
  }

  #materializeDefault(field: FieldDefinition, mapping: WeakMap<object, unknown>): unknown {
    const value = field.defaultValue;
    if (isAbsentSentinel(value)) {
      return undefined;
    }
    if (field.isLazyInstance) {
      if (typeof value === "string") {
        return this.instantiate(value);
      }
      invariant(isCallable(value), `instance field '${field.name}' holds neither a class name nor a factory`);
      return value();
    }
    if (field.isSharedReference) {
      return value;
    }
    return deepCopy(value, mapping);
  }

  #runConstructor(instance: ClassInstance, args: unknown[]) {
    // no field named after the class means no constructor runs at all
    if (!instance.definition.fields.has(instance.className)) {
      return;
    }
    const construct = instance[storageSymbol].get(instance.className);
    if (isCallable(construct)) {
      construct(instance, ...args);
    }
  }
}

export const createRegistry = (config?: RegistryConfigInput) => new ClassRegistry(config);
