import type { ClassInstance } from "./ClassInstance";
import type { RegistryConfig, RegistryLogger, UndefinedFieldPolicy } from "./config";
import { AccessError } from "./errors";
import {
  type FieldDefinition,
  type FieldKey,
  isPrivateVisibility,
  type Scope,
  scopeSymbol,
  storageSymbol,
  type Visibility
} from "./runtime-types";

/**
 * Per-registry dispatch table for field access.
 * Every instance of a registry shares one gate; the gate reads the schema and the current scope
 * from the instance it is handed.
 */
export interface FieldGate {
  read(instance: ClassInstance, key: FieldKey): unknown;
  write(instance: ClassInstance, key: FieldKey, value: unknown): void;
}

export const isVisibleFrom = (visibility: Visibility, scope: Scope): boolean =>
  visibility === "public" || visibility === scope || (visibility === "protected" && scope !== "public");

// never leak which class owns a private field
const describeLevel = (level: Visibility | Scope) => (isPrivateVisibility(level) ? "private" : level);

function assertVisible(instance: ClassInstance, field: FieldDefinition, action: "read" | "set") {
  const scope = instance[scopeSymbol];
  if (!isVisibleFrom(field.visibility, scope)) {
    throw new AccessError(
      `Trying to ${action} ${describeLevel(field.visibility)} field '${field.name}' of class '${instance.className}' from the ${describeLevel(scope)} scope`
    );
  }
}

/** no visibility, constancy or declaration checks at all */
export const optimizedGate: FieldGate = {
  read: (instance, key) => instance[storageSymbol].get(key),
  write: (instance, key, value) => {
    instance[storageSymbol].set(key, value);
  }
};

export function createCheckedGate(policy: UndefinedFieldPolicy, logger: RegistryLogger): FieldGate {
  return {
    read(instance, key) {
      const storage = instance[storageSymbol];
      if (typeof key === "number") {
        return storage.get(key);
      }
      const field = instance.definition.fields.get(key);
      if (!field) {
        if (policy === "strict") {
          throw new AccessError(`Trying to read undefined field '${key}' of class '${instance.className}'`);
        }
        return storage.get(key);
      }
      assertVisible(instance, field, "read");
      return storage.get(key);
    },
    write(instance, key, value) {
      const storage = instance[storageSymbol];
      if (typeof key === "number") {
        storage.set(key, value);
        return;
      }
      const field = instance.definition.fields.get(key);
      if (!field) {
        if (policy !== "relaxed") {
          throw new AccessError(`Trying to set undefined field '${key}' of class '${instance.className}'`);
        }
        if (!storage.has(key)) {
          logger.warn(`implicitly defining field '${key}' on an instance of '${instance.className}'`);
        }
        storage.set(key, value);
        return;
      }
      assertVisible(instance, field, "set");
      if (field.isConstant) {
        throw new AccessError(
          field.isMethod || field.isOperator
            ? `Trying to overwrite a method '${field.name}' of class '${instance.className}'`
            : `Trying to overwrite a constant value '${field.name}' of class '${instance.className}'`
        );
      }
      storage.set(key, value);
    }
  };
}

export function createFieldGate(config: RegistryConfig): FieldGate {
  return config.accessMode === "optimized" ? optimizedGate : createCheckedGate(config.undefinedFields, config.logger);
}
