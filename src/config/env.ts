import "dotenv/config";
import { z } from "zod";

function emptyToUndefined(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim().length === 0 ? undefined : value;
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),

  CORS_ORIGIN: z.preprocess(emptyToUndefined, z.string().optional()),

  POOL_STORE: z.enum(["memory", "mongo"]).default("memory"),
  MONGODB_URI: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  MONGODB_DB: z.string().min(1).default("proceeds-pool"),

  API_AUTH_TOKEN: z.string().min(1),

  DEFAULT_POOL_ID: z.preprocess(emptyToUndefined, z.string().regex(/^[a-z0-9-]{1,64}$/).optional()),
  DEFAULT_POOL_ADMIN: z.preprocess(emptyToUndefined, z.string().regex(/^0x[a-fA-F0-9]{40}$/).optional()),
}).superRefine((value, ctx) => {
  if (value.POOL_STORE === "mongo" && !value.MONGODB_URI) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "MONGODB_URI is required when POOL_STORE=mongo",
      path: ["MONGODB_URI"],
    });
  }

  if ((value.DEFAULT_POOL_ID === undefined) !== (value.DEFAULT_POOL_ADMIN === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "DEFAULT_POOL_ID and DEFAULT_POOL_ADMIN must be set together",
      path: ["DEFAULT_POOL_ADMIN"],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
