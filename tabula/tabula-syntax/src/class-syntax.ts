import dedent from "dedent";
import {
  type ClassBody,
  type ClassDefinition,
  type ClassRegistry,
  DefinitionError,
  UsageError
} from "@tabula-js/tabula";

/** `.from("A")` result: more parent names, or the body that finishes the declaration */
export type ParentChain = {
  (parent: string): ParentChain;
  (body: ClassBody): ClassDefinition;
};

export type ClassDeclaration = {
  (body: ClassBody): ClassDefinition;
  from(parents: string | readonly string[]): ParentChain;
};

export type ClassSyntax = (name: string) => ClassDeclaration;

const USAGE = dedent`
  Class("Name")({ ... })
  Class("Name").from("Parent")({ ... })
  Class("Name").from(["ParentA", "ParentB"])({ ... })
`;

const withUsage = (message: string) => `${message}\n${USAGE}`;

const isPlainBody = (value: unknown): value is ClassBody =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function assertBody(name: string, body: unknown): asserts body is ClassBody {
  if (Array.isArray(body)) {
    throw new UsageError(withUsage(dedent`
      Class body of '${name}' is an array (${body.map(String).join(", ")}).
      This may be the result of passing parents as a second list, which isn't possible. Please use:
    `));
  }
  if (!isPlainBody(body)) {
    throw new UsageError(withUsage(dedent`
      Class body of '${name}' isn't an object (${typeof body}). Please use:
    `));
  }
}

function normalizeParents(name: string, parents: unknown): string[] {
  if (typeof parents === "string") {
    return [parents];
  }
  if (!Array.isArray(parents)) {
    throw new UsageError(withUsage(dedent`
      Class '${name}' is trying to inherit from a non-string type (${typeof parents}). Please use:
    `));
  }
  if (parents.length === 0) {
    throw new UsageError(withUsage(dedent`
      Class '${name}' is trying to inherit from an empty list. Please use:
    `));
  }
  const names: string[] = [];
  for (const parent of parents) {
    if (typeof parent !== "string") {
      throw new UsageError(`Class '${name}' is trying to inherit from a non-string type (${typeof parent})`);
    }
    names.push(parent);
  }
  return names;
}

/** plain-function form of a declaration; an empty parent list declares a root class */
export function declareClass(
  registry: ClassRegistry,
  name: string,
  parents: string | readonly string[],
  body: ClassBody
): ClassDefinition {
  const parentNames = Array.isArray(parents) && parents.length === 0 ? [] : normalizeParents(name, parents);
  assertBody(name, body);
  return registry.defineClass(name, parentNames, body);
}

function parentChain(registry: ClassRegistry, name: string, parents: readonly string[]): ParentChain {
  function chain(parent: string): ParentChain;
  function chain(body: ClassBody): ClassDefinition;
  function chain(input: string | ClassBody): ParentChain | ClassDefinition {
    if (typeof input === "string") {
      return parentChain(registry, name, [...parents, input]);
    }
    assertBody(name, input);
    return registry.defineClass(name, parents, input);
  }
  return chain;
}

/**
 * Fluent declarations bound to one registry:
 * ```ts
 * const Class = createClassSyntax(registry);
 * Class("Animal")({ name: "", Animal(self, name) { self.set("name", name); } });
 * Class("Dog").from("Animal")({ protected__tricks: [] });
 * ```
 */
export function createClassSyntax(registry: ClassRegistry): ClassSyntax {
  return (name) => {
    if (typeof name !== "string") {
      throw new UsageError(withUsage(dedent`
        Class name is of type ${typeof name} instead of string. To create a class, use:
      `));
    }
    if (registry.hasClass(name)) {
      throw new DefinitionError(`Class '${name}' is already defined`);
    }
    const declaration = (body: ClassBody): ClassDefinition => {
      assertBody(name, body);
      return registry.defineClass(name, [], body);
    };
    return Object.assign(declaration, {
      from: (parents: string | readonly string[]) => parentChain(registry, name, normalizeParents(name, parents))
    });
  };
}
