import { z } from "zod";
import { configurationError } from "../errors.js";
import { parseLogLevel, type LogLevel } from "../logger.js";

const ServerEnvSchema = z.object({
  TROUPE_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  TROUPE_QUEUE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000)
});

export type ServerEnv = {
  maxConcurrentRuns: number;
  queueTimeoutMs: number;
  logLevel: LogLevel;
};

/**
 * Read server tuning from the environment. Unset or empty values take the defaults.
 * @throws TroupeError CONFIGURATION_ERROR on malformed values
 */
export function readServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse({
    TROUPE_MAX_CONCURRENT: env.TROUPE_MAX_CONCURRENT || undefined,
    TROUPE_QUEUE_TIMEOUT_MS: env.TROUPE_QUEUE_TIMEOUT_MS || undefined
  });
  if (!parsed.success) {
    const summary = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw configurationError(`Invalid environment: ${summary}`);
  }
  return {
    maxConcurrentRuns: parsed.data.TROUPE_MAX_CONCURRENT,
    queueTimeoutMs: parsed.data.TROUPE_QUEUE_TIMEOUT_MS,
    logLevel: parseLogLevel(env.TROUPE_LOG_LEVEL)
  };
}

/**
 * Snapshot the credentials the roster's agents name, so backends never read process.env themselves.
 */
export function collectCredentials(
  names: Iterable<string>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, string | undefined> {
  const credentials: Record<string, string | undefined> = {};
  for (const name of names) {
    credentials[name] = env[name];
  }
  return credentials;
}
