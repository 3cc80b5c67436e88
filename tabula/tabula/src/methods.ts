import { ClassInstance } from "./ClassInstance";
import { UsageError } from "./errors";
import { type FieldDefinition, isCallable, type Method, privateScopeOf, type SuperReference } from "./runtime-types";
import { withScope } from "./scope";

/**
 * Binds a method body to the class that declares it: every call checks the receiver and
 * raises its scope to that class's private scope for the duration of the call.
 */
export function wrapMethod(className: string, methodName: string, body: Method): Method {
  const scope = privateScopeOf(className);
  const method: Method = (self, ...args) => {
    // the signature says ClassInstance, but unbound calls from untyped code land here too
    if (!(self instanceof ClassInstance) || !self.isA(className)) {
      throw new UsageError(
        `Method '${methodName}' of class '${className}' was called without a '${className}' receiver; use instance.call("${methodName}", ...args)`
      );
    }
    return withScope(self, scope, () => body(self, ...args));
  };
  Object.defineProperty(method, "name", { value: methodName });
  return method;
}

export function buildSuperReference(className: string, fields: ReadonlyMap<string, FieldDefinition>): SuperReference {
  const methods: Record<string, Method> = {};
  for (const field of fields.values()) {
    if (field.isMethod && isCallable(field.defaultValue)) {
      methods[field.name] = field.defaultValue;
    }
  }
  const constructorField = fields.get(className);
  const construct = (self: ClassInstance, ...args: unknown[]): unknown => {
    if (!constructorField?.isMethod || !isCallable(constructorField.defaultValue)) {
      throw new UsageError(`Class '${className}' has no constructor`);
    }
    return constructorField.defaultValue(self, ...args);
  };
  return Object.assign(construct, { className, methods: Object.freeze(methods) });
}

/** constructor for `ClassName: "inherit"`: every direct parent's constructor, last parent first */
export function inheritedConstructor(parents: readonly SuperReference[]): Method {
  return (self, ...args) => {
    for (const parent of [...parents].reverse()) {
      parent(self, ...args);
    }
  };
}
