import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  port: number;
  corsOrigin: string;
  seedProducts: boolean;
}

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  CORS_ORIGIN: z.string().min(1).default("*"),
  SEED_PRODUCTS: z.enum(["true", "false"]).default("true"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join(".") : "environment";
    throw new ConfigError(
      `Invalid value for ${variable}: ${issue?.message ?? "unknown error"}`,
    );
  }

  return {
    port: parsed.data.PORT,
    corsOrigin: parsed.data.CORS_ORIGIN,
    seedProducts: parsed.data.SEED_PRODUCTS === "true",
  };
}
