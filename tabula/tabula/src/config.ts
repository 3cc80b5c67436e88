import * as z from "zod";
import type { Simplify } from "type-fest";
import { ConfigurationError } from "./errors";

export type RegistryLogger = {
  warn: (message: string, ...details: unknown[]) => void;
  debug: (message: string, ...details: unknown[]) => void;
};

const isLogger = (value: unknown): value is RegistryLogger =>
  typeof value === "object" &&
  value !== null &&
  "warn" in value &&
  typeof value.warn === "function" &&
  "debug" in value &&
  typeof value.debug === "function";

export const registryConfigSchema = z.object({
  /**
   * - strict: reading or writing an undeclared field throws
   * - permissive-read: undeclared reads give `undefined`, writes throw
   * - relaxed: both are allowed, writes land in the instance's own storage
   */
  undefinedFields: z.enum(["strict", "permissive-read", "relaxed"]).default("strict"),
  /** optimized skips the access gate entirely */
  accessMode: z.enum(["checked", "optimized"]).default("checked"),
  logger: z
    .custom<RegistryLogger>(isLogger, { message: "logger must provide warn() and debug()" })
    .default(() => console)
});

export type RegistryConfigInput = z.input<typeof registryConfigSchema>;
export type RegistryConfig = Readonly<Simplify<z.output<typeof registryConfigSchema>>>;
export type UndefinedFieldPolicy = RegistryConfig["undefinedFields"];
export type AccessMode = RegistryConfig["accessMode"];

/** accepts untyped input (a parsed JSON file, for instance); everything is validated here */
export function resolveRegistryConfig(input: unknown = {}): RegistryConfig {
  const parsed = registryConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(({ path, message }) => `${path.join(".") || "<root>"}: ${message}`);
    throw new ConfigurationError(`Invalid registry configuration (${issues.join("; ")})`, { cause: parsed.error });
  }
  return Object.freeze(parsed.data);
}
