import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const truthyTokens = new Set(["1", "true", "yes", "on"]);
const booleanLike = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : truthyTokens.has(value.trim().toLowerCase())));

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const rootEnvPath = path.resolve(currentDir, "../../../../.env");
const apiEnvPath = path.resolve(currentDir, "../../.env");
const cwdEnvPath = path.resolve(process.cwd(), ".env");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().int().positive().default(8080),
  API_HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  BACKHAUL_CONFIG_FILE: z.string().default("./config/backhaul.json"),
  BACKHAUL_STATE_FILE: z.string().default("./data/backup-state.json"),
  BACKHAUL_PASSWORD_ENV: z.string().min(1).default("BACKHAUL_PASSWORD"),
  WATCH_ON_START: booleanLike(true)
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }
  return parsed.data;
}

export function loadDotenvFiles(): void {
  dotenv.config({ path: rootEnvPath });
  dotenv.config({ path: apiEnvPath, override: true });
  dotenv.config({ path: cwdEnvPath, override: true });
}
