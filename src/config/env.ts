import { z } from "zod";

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"], {
      required_error: "NODE_ENV is not defined!",
    }),
    PORT: z.coerce.number().int().positive().default(5000),
    MONGODB_URI: z.string().min(1).default("mongodb://localhost:27017"),
    DATABASE_NAME: z.string().min(1).default("drone_alerts_db"),
    WS_PATH: z.string().startsWith("/").default("/ws/events"),
    CORS_ORIGIN: z.string().min(1).default("*"),
    SNAPSHOT_SIZE: z.coerce.number().int().min(1).max(100).default(50),
    CHANGE_FEED_RETRY_MS: z.coerce.number().int().positive().default(3000),
    CHANGE_FEED_MAX_RETRY_MS: z.coerce.number().int().positive().default(30000),
    SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  })
  .refine((env) => env.CHANGE_FEED_MAX_RETRY_MS >= env.CHANGE_FEED_RETRY_MS, {
    message: "CHANGE_FEED_MAX_RETRY_MS must not be lower than CHANGE_FEED_RETRY_MS",
    path: ["CHANGE_FEED_MAX_RETRY_MS"],
  });

export type Config = z.infer<typeof EnvSchema>;

/**
 * Parse the process environment. Throws with every offending variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings from .env files count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
  const result = EnvSchema.safeParse(cleaned);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(env)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${details}`);
  }

  return result.data;
}
