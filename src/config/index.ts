import { z } from "zod";

export const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Docker daemon connection. When socketPath is unset, dockerode falls back to DOCKER_HOST. */
  docker: z
    .object({
      socketPath: z.string().min(1).optional(),
    })
    .default({}),

  /** Image repository; the caller supplies the tag (e.g. "16"). */
  postgres: z
    .object({
      repository: z.string().min(1).default("postgres"),
    })
    .default({}),

  /** Readiness polling bounds, overridable per startPostgresContainer call. */
  readiness: z
    .object({
      timeoutMs: z.coerce.number().int().positive().default(10_000),
      pollIntervalMs: z.coerce.number().int().positive().default(100),
      pingTimeoutMs: z.coerce.number().int().positive().default(1_000),
    })
    .default({}),
});

export const config = configSchema.parse({
  logLevel: process.env.LOG_LEVEL,
  docker: {
    socketPath: process.env.DOCKER_SOCKET_PATH || undefined,
  },
  postgres: {
    repository: process.env.EPHEMERAL_PG_IMAGE || undefined,
  },
  readiness: {
    timeoutMs: process.env.EPHEMERAL_PG_TIMEOUT_MS,
    pollIntervalMs: process.env.EPHEMERAL_PG_POLL_INTERVAL_MS,
    pingTimeoutMs: process.env.EPHEMERAL_PG_PING_TIMEOUT_MS,
  },
});

export type Config = z.infer<typeof configSchema>;
