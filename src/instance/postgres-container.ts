import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { ContainerRuntime, ContainerSpec } from "../runtime/container-runtime.js";
import { getDefaultRuntime } from "../runtime/singleton.js";
import { findFreePort } from "./credentials.js";
import { errorMessage, StartupCancelledError, StartupError, type StartupPhase, TeardownError } from "./errors.js";
import { ensureImage, imageReference } from "./image-resolver.js";
import { type DatabasePinger, PgPinger } from "./pinger.js";
import { waitUntilReady } from "./readiness.js";
import { CompensationStack } from "./rollback.js";
import {
  buildConnectionString,
  type InstanceConfig,
  type InstanceOptions,
  LOOPBACK_HOST,
  parseInstanceOptions,
  toInstanceConfig,
} from "./types.js";

/** Port Postgres listens on inside the container. */
export const POSTGRES_PORT = 5432;

export const MANAGED_LABEL = "ephemeral-pg.managed";

export type StartOptions = InstanceOptions & {
  /** Defaults to the process-wide DockerRuntime. */
  runtime?: ContainerRuntime;
  /** Defaults to a PgPinger. */
  pinger?: DatabasePinger;
  /** Aborting cancels startup; anything already created is rolled back. */
  signal?: AbortSignal;
  /** Image repository; the version argument is its tag. */
  repository?: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
};

/**
 * A running, ready Postgres container. Obtain one from
 * startPostgresContainer and release it with shutdown().
 */
export class PostgresContainer {
  private closed = false;

  constructor(
    private readonly runtime: ContainerRuntime,
    /** Runtime-assigned container id. */
    readonly id: string,
    /** Host port bound to the container's 5432. */
    readonly port: number,
    readonly instance: InstanceConfig,
    readonly connectionString: string,
  ) {}

  get password(): string {
    return this.instance.password;
  }

  /**
   * Stop, then remove the container. The first failing step throws a
   * TeardownError and the remaining step is skipped; nothing is retried.
   * Calling again after a successful shutdown is a no-op.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;

    try {
      await this.runtime.stopContainer(this.id);
    } catch (err) {
      throw new TeardownError("stop", this.id, { cause: err });
    }
    try {
      await this.runtime.removeContainer(this.id);
    } catch (err) {
      throw new TeardownError("remove", this.id, { cause: err });
    }

    this.closed = true;
    logger.info(`Removed container ${this.id}`);
  }
}

/**
 * Start a throwaway Postgres container and wait until it accepts
 * connections. `version` is the image tag, e.g. "16" for postgres:16.
 *
 * Steps: resolve (pull on cache miss) the image, pick a free port and a
 * password, create and start the container, then wait for its health check
 * and a live ping. A failure at any point after creation stops and removes
 * the container before the StartupError is thrown.
 *
 * Startup takes a few seconds (much longer on first pull), so start one
 * container per suite rather than per test. See usePostgresContainer.
 */
export async function startPostgresContainer(version: string, options: StartOptions = {}): Promise<PostgresContainer> {
  const {
    runtime = getDefaultRuntime(),
    pinger = new PgPinger(config.readiness.pingTimeoutMs),
    signal,
    repository = config.postgres.repository,
    timeoutMs = config.readiness.timeoutMs,
    pollIntervalMs = config.readiness.pollIntervalMs,
    ...instanceOptions
  } = options;

  const parsed = parseInstanceOptions(instanceOptions);
  const image = imageReference(repository, version);

  await inPhase("resolution", `Failed to resolve image ${image}`, signal, () => ensureImage(runtime, image, signal));

  const { instance, port } = await inPhase(
    "allocation",
    "Failed to allocate port and credentials",
    signal,
    async () => ({ instance: toInstanceConfig(parsed), port: await findFreePort(LOOPBACK_HOST) }),
  );

  const spec: ContainerSpec = {
    image,
    env: {
      POSTGRES_DB: instance.dbname,
      POSTGRES_USER: instance.user,
      POSTGRES_PASSWORD: instance.password,
      TZ: instance.timezone,
      PGTZ: instance.timezone,
    },
    healthCheck: {
      test: ["CMD", "pg_isready", "-U", instance.user, "-d", instance.dbname],
      intervalMs: 1_000,
      timeoutMs: 1_000,
      retries: 10,
    },
    portBinding: { containerPort: POSTGRES_PORT, hostIp: LOOPBACK_HOST, hostPort: port },
    labels: { [MANAGED_LABEL]: "true" },
  };

  const id = await inPhase("creation", `Failed to create container from ${image}`, signal, () =>
    runtime.createContainer(spec),
  );

  const rollback = new CompensationStack();
  rollback.push(`remove container ${id}`, () => runtime.removeContainer(id));

  try {
    await inPhase("creation", `Failed to start container ${id}`, signal, () => runtime.startContainer(id));
    rollback.push(`stop container ${id}`, () => runtime.stopContainer(id));

    const connectionString = buildConnectionString(instance, port);
    await waitUntilReady({ runtime, pinger, containerId: id, connectionString, timeoutMs, pollIntervalMs, signal });

    rollback.discard();
    logger.info(`Postgres container ${id} ready on ${LOOPBACK_HOST}:${port}`, { image });
    return new PostgresContainer(runtime, id, port, instance, connectionString);
  } catch (err) {
    logger.warn(`Startup of container ${id} failed, rolling back`, { err });
    await rollback.unwind();
    throw err;
  }
}

/**
 * Run one startup step. A signal that is already aborted skips the step, and
 * a step that fails after the signal aborted is reported as cancelled.
 */
async function inPhase<T>(
  phase: StartupPhase,
  context: string,
  signal: AbortSignal | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  if (signal?.aborted) throw new StartupCancelledError(phase, { cause: signal.reason });
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StartupError) throw err;
    if (signal?.aborted) throw new StartupCancelledError(phase, { cause: err });
    throw new StartupError(phase, `${context}: ${errorMessage(err)}`, { cause: err });
  }
}
