import invariant from "tiny-invariant";
import { decodeFieldKey, type FieldModifiers } from "./annotations";
import type { RegistryLogger } from "./config";
import { deepCopy } from "./clone";
import { DefinitionError } from "./errors";
import { INHERIT_CONSTRUCTOR } from "./globals";
import { buildSuperReference, inheritedConstructor, wrapMethod } from "./methods";
import {
  type ClassBody,
  type ClassDefinition,
  type FieldDefinition,
  HardAbsent,
  isCallable,
  isPrivateVisibility,
  isSuperReference,
  privateScopeOf,
  SoftAbsent,
  type Visibility
} from "./runtime-types";

export type ClassBlueprint = {
  name: string;
  /** resolved direct parents, in priority order */
  parents: readonly ClassDefinition[];
  body: ClassBody;
  /** resolves any ancestor of the new class */
  resolveAncestor: (name: string) => ClassDefinition;
  logger: RegistryLogger;
};

const describeVisibility = (visibility: Visibility) =>
  isPrivateVisibility(visibility) ? `private (owned by '${visibility.slice("private:".length)}')` : visibility;

/**
 * Which of two inherited declarations survives. `placed` came from a parent listed later,
 * `incoming` from the parent currently being merged (listed earlier, so higher priority).
 */
function pickInherited(placed: FieldDefinition, incoming: FieldDefinition): FieldDefinition {
  if (incoming.defaultValue === HardAbsent) {
    return incoming;
  }
  if (placed.defaultValue === HardAbsent || incoming.defaultValue === SoftAbsent) {
    return placed;
  }
  return incoming;
}

function assertInheritable(className: string, placed: FieldDefinition, incoming: FieldDefinition) {
  if (placed.visibility !== incoming.visibility) {
    if (isPrivateVisibility(placed.visibility) && isPrivateVisibility(incoming.visibility)) {
      throw new DefinitionError(
        `Class '${className}' inherits two different private fields named '${incoming.name}' ` +
          `(${describeVisibility(incoming.visibility)} and ${describeVisibility(placed.visibility)}); ` +
          `private field names must be unique across all ancestors`
      );
    }
    throw new DefinitionError(
      `Class '${className}' inherits field '${incoming.name}' with conflicting access levels ` +
        `(${describeVisibility(incoming.visibility)} and ${describeVisibility(placed.visibility)})`
    );
  }
  if (placed.isConstant !== incoming.isConstant) {
    throw new DefinitionError(
      `Class '${className}' inherits field '${incoming.name}' as constant from one parent and as variable from another`
    );
  }
}

/** an ancestor's own constructor, or a super reference a parent installed */
const isAncestorSlot = (field: FieldDefinition) =>
  (field.isMethod && field.name === field.declaringClass) || isSuperReference(field.defaultValue);

function collectComposition(parents: readonly ClassDefinition[]): Set<string> {
  const composition = new Set<string>();
  for (const parent of parents) {
    composition.add(parent.name);
    for (const ancestor of parent.composition) {
      composition.add(ancestor);
    }
  }
  return composition;
}

function resolveConstructor(
  className: string,
  parents: readonly ClassDefinition[],
  value: unknown,
  modifiers: FieldModifiers
): unknown {
  if (modifiers.isNonMethod || modifiers.isLazyInstance || modifiers.isOperator || modifiers.isSharedReference) {
    throw new DefinitionError(`Constructor of class '${className}' cannot be marked as anything but an access level`);
  }
  if (isCallable(value)) {
    return value;
  }
  if (value !== INHERIT_CONSTRUCTOR) {
    throw new DefinitionError(
      `Field '${className}' of class '${className}' is reserved for its constructor and must be a function or "${INHERIT_CONSTRUCTOR}"`
    );
  }
  const constructible = parents.filter((parent) => parent.fields.get(parent.name)?.isMethod);
  if (constructible.length === 0) {
    throw new DefinitionError(
      `Class '${className}' inherits its constructor, but none of its parents (${parents.map(({ name }) => `'${name}'`).join(", ") || "none"}) has one`
    );
  }
  return inheritedConstructor(constructible.map(({ superReference }) => superReference));
}

function declareOwnField(
  blueprint: ClassBlueprint,
  fieldName: string,
  modifiers: FieldModifiers,
  rawValue: unknown,
  inherited: FieldDefinition | undefined
): FieldDefinition {
  const { name: className, parents } = blueprint;
  let value: unknown = rawValue === undefined ? HardAbsent : rawValue;
  if (fieldName === className) {
    value = resolveConstructor(className, parents, value, modifiers);
  }

  const keepsInheritedShape = modifiers.isBare && inherited !== undefined;
  const isLazyInstance = keepsInheritedShape ? inherited.isLazyInstance : modifiers.isLazyInstance;
  const isSharedReference = keepsInheritedShape ? inherited.isSharedReference : modifiers.isSharedReference;
  const isNonMethod = keepsInheritedShape ? inherited.isNonMethod : modifiers.isNonMethod;
  const isOperator = modifiers.isOperator || (inherited?.isOperator ?? false);

  if (isLazyInstance && typeof value !== "string" && !isCallable(value)) {
    throw new DefinitionError(
      `Instance field '${fieldName}' of class '${className}' must hold a class name or a factory function`
    );
  }
  if (isOperator && !isCallable(value)) {
    throw new DefinitionError(`Operator '${fieldName}' of class '${className}' must be a function`);
  }
  const isMethod = isCallable(value) && !isOperator && !isLazyInstance && !isNonMethod;

  let visibility: Visibility;
  let isConstant: boolean;
  if (inherited === undefined) {
    visibility = modifiers.access === "private" ? privateScopeOf(className) : (modifiers.access ?? "public");
    isConstant = modifiers.isConstant || isMethod || isOperator;
  } else if (modifiers.isBare) {
    visibility = inherited.visibility;
    isConstant = inherited.isConstant;
    if ((isMethod || isOperator) && !isConstant) {
      throw new DefinitionError(
        `Class '${className}' cannot turn inherited variable '${fieldName}' into a method; mark it nonmethod or declare it const in the ancestor`
      );
    }
    if (isPrivateVisibility(visibility)) {
      blueprint.logger.warn(
        `class '${className}' overrides the default of '${fieldName}', which is private to an ancestor and unreadable from '${className}'`
      );
    }
  } else {
    visibility = modifiers.access === "private" ? privateScopeOf(className) : (modifiers.access ?? "public");
    isConstant = modifiers.isConstant || isMethod || isOperator;
    if (visibility !== inherited.visibility) {
      if (isPrivateVisibility(visibility) && isPrivateVisibility(inherited.visibility)) {
        throw new DefinitionError(
          `Class '${className}' declares private field '${fieldName}', which is already ${describeVisibility(inherited.visibility)}`
        );
      }
      throw new DefinitionError(
        `Attempting to change access level of field '${fieldName}' in class '${className}' from ${describeVisibility(inherited.visibility)} to ${describeVisibility(visibility)}`
      );
    }
    if (isConstant !== inherited.isConstant) {
      throw new DefinitionError(
        `Attempting to change constancy of field '${fieldName}' in class '${className}' from ${inherited.isConstant ? "constant" : "variable"} to ${isConstant ? "constant" : "variable"}`
      );
    }
  }

  if (isMethod && isCallable(value)) {
    value = wrapMethod(className, fieldName, value);
  } else if (!isSharedReference) {
    // later edits to the body object must not reach registered defaults
    value = deepCopy(value);
  }

  return {
    name: fieldName,
    visibility,
    defaultValue: value,
    isConstant,
    isSharedReference,
    isLazyInstance,
    isMethod,
    isNonMethod,
    isOperator,
    declaringClass: className
  };
}

/**
 * Builds the complete, frozen schema of a class:
 * parents merged last-to-first so the first parent ends up with the final say,
 * a super reference for every ancestor, then the class's own body laid over the result.
 * Nothing is registered here - a throw leaves no trace.
 */
export function buildClassDefinition(blueprint: ClassBlueprint): ClassDefinition {
  const { name, parents, body, resolveAncestor } = blueprint;
  const composition = collectComposition(parents);
  invariant(!composition.has(name), `class '${name}' cannot be its own ancestor`);

  const fields = new Map<string, FieldDefinition>();
  const indexedDefaults = new Map<number, unknown>();

  for (const parent of [...parents].reverse()) {
    for (const field of parent.fields.values()) {
      // ancestor names belong to the super references installed below
      if (composition.has(field.name)) {
        if (isAncestorSlot(field)) {
          continue;
        }
        throw new DefinitionError(
          `Class '${name}' inherits field '${field.name}' from '${field.declaringClass}', which collides with the name of its ancestor class '${field.name}'`
        );
      }
      const placed = fields.get(field.name);
      if (placed === undefined) {
        fields.set(field.name, field);
        continue;
      }
      assertInheritable(name, placed, field);
      fields.set(field.name, pickInherited(placed, field));
    }
    for (const [index, value] of parent.indexedDefaults) {
      indexedDefaults.set(index, value);
    }
  }

  for (const ancestorName of composition) {
    fields.set(ancestorName, {
      name: ancestorName,
      visibility: "protected",
      defaultValue: resolveAncestor(ancestorName).superReference,
      isConstant: true,
      isSharedReference: true,
      isLazyInstance: false,
      isMethod: false,
      isNonMethod: false,
      isOperator: false,
      declaringClass: name
    });
  }

  if (Object.getOwnPropertySymbols(body).length > 0) {
    throw new DefinitionError(`Class '${name}' has symbol keys in its body; field keys must be strings or numbers`);
  }
  const declared = new Set<string>();
  for (const [rawKey, rawValue] of Object.entries(body)) {
    const decoded = decodeFieldKey(rawKey);
    if (decoded.kind === "indexed") {
      indexedDefaults.set(decoded.index, deepCopy(rawValue));
      continue;
    }
    const { name: fieldName, modifiers } = decoded;
    if (declared.has(fieldName)) {
      throw new DefinitionError(`Duplicate field '${fieldName}' in class '${name}'`);
    }
    declared.add(fieldName);
    if (composition.has(fieldName)) {
      throw new DefinitionError(
        `Field '${fieldName}' of class '${name}' collides with the name of its ancestor class '${fieldName}'`
      );
    }
    fields.set(fieldName, declareOwnField(blueprint, fieldName, modifiers, rawValue, fields.get(fieldName)));
  }
  const constructorSlot = fields.get(name);
  if (constructorSlot && constructorSlot.declaringClass !== name) {
    throw new DefinitionError(
      `Class '${name}' inherits field '${name}' from '${constructorSlot.declaringClass}', which is reserved for its constructor; redeclare it in the body of '${name}'`
    );
  }

  const definition: ClassDefinition = {
    kind: "class",
    name,
    fields,
    indexedDefaults,
    composition,
    directParents: Object.freeze(parents.map((parent) => parent.name)),
    superReference: buildSuperReference(name, fields)
  };
  return Object.freeze(definition);
}
