import { z } from "zod";
import { lazilyValidate, buildDynamic } from "@syncbuf/shared";

const environmentSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  BUFFER_QUEUE_SIZE: z.number().int().positive().default(10),
  BUFFER_MONITOR_MODE: z.enum(["disabled", "counters"]).default("counters"),
  MONITOR_BATCH_SIZE: z.number().int().positive().default(100),
});

export type Environment = z.infer<typeof environmentSchema>;

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);

export function resolveLogLevel(
  env: Pick<Environment, "NODE_ENV" | "LOG_LEVEL">,
) {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  switch (env.NODE_ENV) {
    case "development":
      return "debug";
    case "test":
      return "silent";
    default:
      return "info";
  }
}
