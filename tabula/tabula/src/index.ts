/**
 * @tabula-js/tabula
 *
 * Class-based object model over plain associative storage: classes are registered at run time from
 * annotated field names (`private__secret`, `const__limit`, `instance__position`), instances route every
 * field access through an access gate that knows which class's private scope is currently active.
 */

export * from "./runtime-types";
export * from "./errors";
export { type AccessMode, type RegistryConfig, type RegistryConfigInput, type RegistryLogger, type UndefinedFieldPolicy, registryConfigSchema, resolveRegistryConfig } from "./config";
export { type DecodedFieldKey, type FieldModifiers, asIndex, decodeFieldKey } from "./annotations";
export { type OperatorHook, INHERIT_CONSTRUCTOR, isOperatorHook } from "./globals";
export { type FieldGate, isVisibleFrom } from "./access-gate";
export { ClassInstance } from "./ClassInstance";
export { ClassRegistry, createRegistry } from "./ClassRegistry";
export { deepCopy } from "./clone";
export * from "./operators";
