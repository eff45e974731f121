import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

// Load .env from monorepo root regardless of cwd
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ConfigSchema = z.object({
  log: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  }),
  watchConfigPath: z.string().min(1).default("chanwatch.config.json"),
  sqlitePath: z.string().min(1).default(".local/matches.sqlite"),
  telegram: z.object({
    botToken: z.string().min(1, "TELEGRAM_BOT_TOKEN must not be empty").optional(),
  }),
  web: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = {
    log: {
      level: process.env.LOG_LEVEL || undefined,
    },
    watchConfigPath: process.env.WATCH_CONFIG_PATH || undefined,
    sqlitePath: process.env.SQLITE_PATH || undefined,
    telegram: {
      botToken: process.env.TELEGRAM_BOT_TOKEN || undefined,
    },
    web: {
      port: process.env.PORT || undefined,
    },
  };

  try {
    cachedConfig = ConfigSchema.parse(raw);
    return cachedConfig;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
      throw new Error(`Configuration error:\n${messages}\n\nPlease check your .env file.`);
    }
    throw error;
  }
}
