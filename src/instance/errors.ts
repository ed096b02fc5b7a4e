/** Where a failed startPostgresContainer call gave up. */
export type StartupPhase = "resolution" | "allocation" | "creation" | "health" | "connectivity";

export type ReadinessPhase = Extract<StartupPhase, "health" | "connectivity">;

export type TeardownStep = "stop" | "remove";

export class EphemeralPgError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EphemeralPgError";
  }
}

/**
 * A startup failure. No handle exists when this is thrown, and any container
 * created along the way has already been handed to the rollback path.
 */
export class StartupError extends EphemeralPgError {
  readonly phase: StartupPhase;

  constructor(phase: StartupPhase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupError";
    this.phase = phase;
  }
}

/** The container's own health check reported a definitive failure. */
export class ContainerUnhealthyError extends StartupError {
  readonly containerId: string;

  constructor(containerId: string) {
    super("health", `Container ${containerId} reported unhealthy`);
    this.name = "ContainerUnhealthyError";
    this.containerId = containerId;
  }
}

/** The readiness deadline elapsed before the instance became usable. */
export class ReadinessTimeoutError extends StartupError {
  readonly timeoutMs: number;

  constructor(phase: ReadinessPhase, timeoutMs: number, options?: { cause?: unknown }) {
    const waitingFor = phase === "health" ? "a healthy container" : "a database connection";
    super(phase, `Timed out after ${timeoutMs}ms waiting for ${waitingFor}`, options);
    this.name = "ReadinessTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The caller's AbortSignal fired before startup finished. */
export class StartupCancelledError extends StartupError {
  constructor(phase: StartupPhase, options?: { cause?: unknown }) {
    super(phase, `Startup cancelled during ${phase}`, options);
    this.name = "StartupCancelledError";
  }
}

/**
 * A teardown step failed. The container's real state is unknown at this point
 * and should be treated as a possible leak.
 */
export class TeardownError extends EphemeralPgError {
  readonly step: TeardownStep;
  readonly containerId: string;

  constructor(step: TeardownStep, containerId: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to ${step} container ${containerId}${reason}`, options);
    this.name = "TeardownError";
    this.step = step;
    this.containerId = containerId;
  }
}

/** The container runtime has no image or container by that reference. */
export class RuntimeNotFoundError extends EphemeralPgError {
  readonly reference: string;

  constructor(kind: "image" | "container", reference: string, options?: { cause?: unknown }) {
    super(`No such ${kind}: ${reference}`, options);
    this.name = "RuntimeNotFoundError";
    this.reference = reference;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
