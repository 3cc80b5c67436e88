import { describe, expect, it } from "vitest";
import { resolveRegistryConfig } from "../config";
import { ClassRegistry } from "../ClassRegistry";
import { ConfigurationError } from "../errors";

describe("resolveRegistryConfig", () => {
  it("fills in defaults", () => {
    const config = resolveRegistryConfig();

    expect(config.undefinedFields).toBe("strict");
    expect(config.accessMode).toBe("checked");
    expect(config.logger).toBe(console);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("accepts parsed JSON input", () => {
    const config = resolveRegistryConfig(JSON.parse('{"undefinedFields":"relaxed","accessMode":"optimized"}'));

    expect(config.undefinedFields).toBe("relaxed");
    expect(config.accessMode).toBe("optimized");
  });

  it("rejects unknown modes", () => {
    expect(() => resolveRegistryConfig({ accessMode: "fast" })).toThrow(ConfigurationError);
    expect(() => resolveRegistryConfig({ accessMode: "fast" })).toThrow(/^Invalid registry configuration \(accessMode: /);
  });

  it("rejects loggers without warn and debug", () => {
    expect(() => resolveRegistryConfig({ logger: { info: () => undefined } })).toThrow(
      "Invalid registry configuration (logger: logger must provide warn() and debug())"
    );
  });

  it("is applied by the registry", () => {
    const registry = new ClassRegistry({ undefinedFields: "permissive-read" });

    expect(registry.config.undefinedFields).toBe("permissive-read");
    expect(() => new ClassRegistry(JSON.parse('{"undefinedFields":"loose"}'))).toThrow(ConfigurationError);
  });
});
