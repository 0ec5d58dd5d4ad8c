import { z } from "zod";

type ZodSchemaShape = z.ZodRawShape;

/**
 * Reads every key of the schema from `source` (defaults to `process.env`)
 * and coerces the raw strings into the shape the schema expects.
 */
export function buildDynamic(
  schema: z.ZodObject<ZodSchemaShape>,
  source: NodeJS.ProcessEnv = process.env,
) {
  return Object.keys(schema.shape).reduce(
    (acc, key) => {
      acc[key] = coerceValue(source[key], schema.shape[key]);
      return acc;
    },
    {} as Record<string, unknown>,
  );
}

function unwrap(fieldSchema: z.ZodTypeAny): z.ZodTypeAny {
  let inner = fieldSchema;
  while (
    inner instanceof z.ZodDefault ||
    inner instanceof z.ZodOptional ||
    inner instanceof z.ZodNullable
  ) {
    inner = inner._def.innerType;
  }
  return inner;
}

function coerceValue(value: string | undefined, fieldSchema: z.ZodTypeAny) {
  // Empty strings count as unset so defaults apply
  if (value === undefined || value === "") return undefined;

  const inner = unwrap(fieldSchema);

  if (inner instanceof z.ZodNumber) {
    return Number(value);
  } else if (inner instanceof z.ZodBoolean) {
    return value.toLowerCase() === "true" || value === "1";
  } else if (inner instanceof z.ZodArray) {
    try {
      return JSON.parse(value);
    } catch {
      return value.split(",").map((item) => item.trim());
    }
  } else if (inner instanceof z.ZodObject) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }

  return value;
}

export class EnvironmentError extends Error {
  constructor(readonly issues: string[]) {
    super(`Missing or invalid environment variables: ${issues.join("; ")}`);
    this.name = "EnvironmentError";
  }
}

// Validation runs on first property access, so importing a module that
// declares its environment never throws by itself.
export function lazilyValidate<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  environmentMap: Record<string, unknown>,
): z.infer<z.ZodObject<T>> {
  let _variables: z.infer<z.ZodObject<T>> | null = null;

  function validateEnvironment() {
    if (_variables) return _variables;

    const parsed = schema.safeParse(environmentMap);

    if (!parsed.success) {
      throw new EnvironmentError(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      );
    }

    _variables = parsed.data;
    return _variables;
  }

  return new Proxy({} as z.infer<z.ZodObject<T>>, {
    get(_target, prop) {
      return Reflect.get(validateEnvironment(), prop);
    },
  });
}
