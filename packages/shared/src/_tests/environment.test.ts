import { describe, test, expect } from "vitest";
import { z } from "zod";
import { buildDynamic, lazilyValidate, EnvironmentError } from "../environment";

const schema = z.object({
  QUEUE_SIZE: z.number().default(10),
  VERBOSE: z.boolean().default(false),
  TAGS: z.array(z.string()).default([]),
  MODE: z.enum(["a", "b"]).default("a"),
});

describe("buildDynamic", () => {
  test("coerces raw strings by field type", () => {
    const env = buildDynamic(schema, {
      QUEUE_SIZE: "25",
      VERBOSE: "TRUE",
      TAGS: "x, y",
      MODE: "b",
    });

    expect(env).toEqual({
      QUEUE_SIZE: 25,
      VERBOSE: true,
      TAGS: ["x", "y"],
      MODE: "b",
    });
  });

  test("parses JSON arrays", () => {
    const env = buildDynamic(schema, { TAGS: '["one","two"]' });
    expect(env.TAGS).toEqual(["one", "two"]);
  });

  test("treats missing and empty values as unset", () => {
    const env = buildDynamic(schema, { QUEUE_SIZE: "" });
    expect(env.QUEUE_SIZE).toBeUndefined();
    expect(env.MODE).toBeUndefined();
  });
});

describe("lazilyValidate", () => {
  test("applies defaults on first access", () => {
    const variables = lazilyValidate(schema, buildDynamic(schema, {}));
    expect(variables.QUEUE_SIZE).toBe(10);
    expect(variables.MODE).toBe("a");
  });

  test("defers failures until a value is read", () => {
    const variables = lazilyValidate(
      schema,
      buildDynamic(schema, { MODE: "c" }),
    );

    expect(() => variables.MODE).toThrow(EnvironmentError);
  });

  test("reports the offending key", () => {
    const variables = lazilyValidate(
      schema,
      buildDynamic(schema, { QUEUE_SIZE: "many" }),
    );

    try {
      void variables.QUEUE_SIZE;
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EnvironmentError);
      if (error instanceof EnvironmentError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith("QUEUE_SIZE: ")).toBe(true);
      }
    }
  });
});
