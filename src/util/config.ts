import "dotenv/config";
import { z } from "zod";

const schema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  VALIDATOR_REPORT_FOLDER: z.string().min(1).default("./reports"),
  VALIDATOR_MAX_ERRORS: z.coerce.number().int().min(1).default(1000),
  // free space kept on the target disk when writing reports
  VALIDATOR_DISK_BUFFER_MB: z.coerce.number().int().min(0).default(100),
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  return schema.parse(env);
}

export const cfg: AppConfig = loadConfig(process.env);
