import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ConfigValidationError, parseConfig } from "../../index.js";

const Schema = z.object({
  retries: z.number().int().min(0),
  mode: z.enum(["fast", "safe"]).default("safe"),
});

describe("parseConfig", () => {
  it("returns parsed data with defaults applied", () => {
    expect(parseConfig("worker", Schema, { retries: 2 })).toEqual({ retries: 2, mode: "safe" });
  });

  it("throws ConfigValidationError with one issue per problem", () => {
    let caught: unknown;
    try {
      parseConfig("worker", Schema, { retries: -1, mode: "slow" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.component).toBe("worker");
    expect(caught.issues.map((issue) => issue.field)).toEqual(["retries", "mode"]);
    expect(caught.issues.map((issue) => issue.code)).toEqual(["too_small", "invalid_enum_value"]);
    expect(caught.cause).toBeInstanceOf(z.ZodError);
  });

  it("names root-level issues", () => {
    expect(() => parseConfig("worker", Schema, "nope")).toThrow(
      "Invalid worker configuration: (root): Expected object, received string",
    );
  });
});
