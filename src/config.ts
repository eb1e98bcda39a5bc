import { z } from "zod";

const envSchema = z.object({
  TARGET_MERCHANT_ID: z.string().min(1).default("GAS123"),
  POINTS_PER_DOLLAR: z.coerce.number().nonnegative().default(1.0),
  CHECKPOINT_PATH: z.string().min(1).default("checkpoint.txt"),
  CHECKPOINT_INTERVAL: z.coerce.number().int().positive().default(1000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export const config: AppConfig = loadConfig();
