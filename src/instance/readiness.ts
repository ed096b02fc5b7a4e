import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";
import {
  ContainerUnhealthyError,
  errorMessage,
  type ReadinessPhase,
  ReadinessTimeoutError,
  StartupCancelledError,
  StartupError,
} from "./errors.js";
import type { DatabasePinger } from "./pinger.js";

export interface ReadinessOptions {
  runtime: ContainerRuntime;
  pinger: DatabasePinger;
  containerId: string;
  connectionString: string;
  /** One deadline shared by both phases. Defaults to config.readiness.timeoutMs. */
  timeoutMs?: number;
  /** Defaults to config.readiness.pollIntervalMs. */
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

type ReadinessState =
  | { phase: "polling-health" }
  | { phase: "polling-connectivity"; lastError?: unknown }
  | { phase: "done" }
  | { phase: "failed"; error: StartupError };

/**
 * Block until the container reports healthy AND a real connection succeeds.
 *
 * Health is polled first; the first ping happens only after a "healthy"
 * status has been observed. "unhealthy" is terminal. Every iteration checks
 * the caller's signal and the deadline before doing any I/O, and an inspect or
 * ping still in flight stops being awaited once either fires. The result is
 * always one of: ready, unhealthy, timed out, cancelled, or an inspect error.
 */
export async function waitUntilReady(options: ReadinessOptions): Promise<void> {
  const { runtime, pinger, containerId, connectionString, signal } = options;
  const timeoutMs = options.timeoutMs ?? config.readiness.timeoutMs;
  const pollIntervalMs = options.pollIntervalMs ?? config.readiness.pollIntervalMs;
  const deadline = Date.now() + timeoutMs;
  const bound: Bound = { deadline, signal };

  let state: ReadinessState = { phase: "polling-health" };
  for (;;) {
    if (state.phase === "done") return;
    if (state.phase === "failed") throw state.error;

    const phase: ReadinessPhase = state.phase === "polling-health" ? "health" : "connectivity";
    const lastError: unknown = state.phase === "polling-connectivity" ? state.lastError : undefined;

    if (signal?.aborted) {
      state = { phase: "failed", error: new StartupCancelledError(phase, { cause: signal.reason }) };
      continue;
    }
    if (Date.now() >= deadline) {
      state = { phase: "failed", error: new ReadinessTimeoutError(phase, timeoutMs, { cause: lastError }) };
      continue;
    }

    const next: ReadinessState =
      state.phase === "polling-health"
        ? await checkHealth(runtime, containerId, bound)
        : await checkConnectivity(pinger, connectionString, lastError, bound);

    if (next.phase === state.phase) {
      await sleep(Math.min(pollIntervalMs, deadline - Date.now()), signal);
    }
    state = next;
  }
}

async function checkHealth(runtime: ContainerRuntime, containerId: string, bound: Bound): Promise<ReadinessState> {
  let health: string;
  try {
    const inspected = await interruptible(runtime.inspectContainer(containerId), bound);
    if (inspected === INTERRUPTED) return { phase: "polling-health" };
    ({ health } = inspected);
  } catch (err) {
    const error = new StartupError("health", `Failed to inspect container ${containerId}: ${errorMessage(err)}`, {
      cause: err,
    });
    return { phase: "failed", error };
  }

  switch (health) {
    case "healthy":
      logger.debug(`Container ${containerId} is healthy, checking connectivity`);
      return { phase: "polling-connectivity" };
    case "unhealthy":
      return { phase: "failed", error: new ContainerUnhealthyError(containerId) };
    default:
      return { phase: "polling-health" };
  }
}

async function checkConnectivity(
  pinger: DatabasePinger,
  connectionString: string,
  lastError: unknown,
  bound: Bound,
): Promise<ReadinessState> {
  try {
    const pinged = await interruptible(pinger.ping(connectionString), bound);
    if (pinged === INTERRUPTED) return { phase: "polling-connectivity", lastError };
    return { phase: "done" };
  } catch (err) {
    logger.debug(`Ping failed, retrying: ${errorMessage(err)}`);
    return { phase: "polling-connectivity", lastError: err };
  }
}

interface Bound {
  deadline: number;
  signal?: AbortSignal;
}

const INTERRUPTED = Symbol("interrupted");

/**
 * Settles like `work`, or resolves to INTERRUPTED as soon as the deadline
 * passes or the signal aborts. An interrupted call keeps running; only the
 * wait for it ends.
 */
function interruptible<T>(work: Promise<T>, { deadline, signal }: Bound): Promise<T | typeof INTERRUPTED> {
  return new Promise((resolve, reject) => {
    const interrupt = () => {
      clearTimeout(timer);
      resolve(INTERRUPTED);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", interrupt);
      resolve(INTERRUPTED);
    }, Math.max(0, deadline - Date.now()));
    signal?.addEventListener("abort", interrupt, { once: true });

    work.then(
      (value) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", interrupt);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", interrupt);
        reject(err);
      },
    );
  });
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
