import { ConfigValidationError } from "@mediaref/errors";
import { createRecordingResolver } from "@mediaref/test-utils";
import { describe, expect, it } from "vitest";
import { Filler } from "../filler.js";
import { PlanRegistry } from "../mapper/registry.js";

describe("Filler configuration", () => {
  const resolver = createRecordingResolver();

  it("should create its own registry by default", () => {
    const filler = new Filler(resolver);

    expect(filler.registry).toBeInstanceOf(PlanRegistry);
    expect(filler.registry.maxDepth).toBe(32);
  });

  it("should apply maxDepth to the registry it creates", () => {
    expect(new Filler(resolver, { maxDepth: 4 }).registry.maxDepth).toBe(4);
  });

  it("should use a supplied registry", () => {
    const registry = new PlanRegistry({ maxDepth: 8 });

    expect(new Filler(resolver, { registry }).registry).toBe(registry);
  });

  it("should refuse maxDepth alongside a registry", () => {
    expect(() => new Filler(resolver, { registry: new PlanRegistry(), maxDepth: 4 })).toThrow(
      "Invalid filler configuration: maxDepth: maxDepth applies only to the default registry; set it on the PlanRegistry instead",
    );
  });

  it("should reject an unknown unmapped policy", () => {
    const decoded = JSON.parse('{"unmapped":"loud"}');

    expect(() => new Filler(resolver, decoded)).toThrow(ConfigValidationError);
  });

  it("should reject a logger without warn", () => {
    const decoded = JSON.parse('{"logger":{"info":1}}');

    expect(() => new Filler(resolver, decoded)).toThrow(
      "Invalid filler configuration: logger: Expected an object with a warn(message) method",
    );
  });
});
