import { vi } from "vitest";
import { ClassInstance } from "../ClassInstance";
import type { RegistryConfigInput } from "../config";
import { ClassRegistry } from "../ClassRegistry";
import { isSuperReference } from "../runtime-types";

/** registry with a silent, inspectable logger */
export function createTestRegistry(config: Omit<RegistryConfigInput, "logger"> = {}) {
  const logger = { warn: vi.fn(), debug: vi.fn() };
  const registry = new ClassRegistry({ ...config, logger });
  return { registry, logger };
}

/** calls the constructor of an ancestor from inside a method body */
export function callSuper(self: ClassInstance, ancestor: string, ...args: unknown[]): unknown {
  const reference = self.get(ancestor);
  if (!isSuperReference(reference)) {
    throw new Error(`'${ancestor}' is not a super reference`);
  }
  return reference(self, ...args);
}

export function asInstance(value: unknown): ClassInstance {
  if (!(value instanceof ClassInstance)) {
    throw new Error(`expected a class instance, got ${typeof value}`);
  }
  return value;
}
