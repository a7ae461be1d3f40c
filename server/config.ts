import { z } from "zod";
import { DEFAULT_CATALOG_PATH } from "./search/catalog";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
  CLIENT_DIST_PATH: z.string().min(1).default("dist/public"),
});

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  catalogPath: string;
  clientDistPath: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration - ${problems}`);
  }

  return {
    nodeEnv: parsed.data.NODE_ENV,
    port: parsed.data.PORT,
    catalogPath: parsed.data.CATALOG_PATH,
    clientDistPath: parsed.data.CLIENT_DIST_PATH,
  };
}
