/**
 * The container engine operations an instance needs. The production
 * implementation is DockerRuntime; tests run against an in-memory fake.
 *
 * Implementations report a missing image or container by rejecting with
 * RuntimeNotFoundError and pass every other failure through unchanged.
 */
export interface ContainerRuntime {
  /** Resolves when the image is in the local store. */
  inspectImage(image: string): Promise<void>;

  /**
   * Pulls the image and resolves only once the pull stream is fully drained.
   * Aborting `signal` cancels the pull.
   */
  pullImage(image: string, signal?: AbortSignal): Promise<void>;

  /** Creates (but does not start) a container and returns its id. */
  createContainer(spec: ContainerSpec): Promise<string>;

  startContainer(id: string): Promise<void>;

  inspectContainer(id: string): Promise<ContainerState>;

  stopContainer(id: string): Promise<void>;

  removeContainer(id: string): Promise<void>;
}

export interface HealthCheckSpec {
  /** Command in Docker HEALTHCHECK form, e.g. ["CMD", "pg_isready"]. */
  test: string[];
  intervalMs: number;
  timeoutMs: number;
  retries: number;
}

export interface PortBinding {
  /** Port inside the container, e.g. 5432. */
  containerPort: number;
  hostIp: string;
  hostPort: number;
}

export interface ContainerSpec {
  image: string;
  env: Record<string, string>;
  healthCheck: HealthCheckSpec;
  portBinding: PortBinding;
  labels?: Record<string, string>;
}

/**
 * Docker reports "starting", "healthy" or "unhealthy" for containers with a
 * health check, and "none" (or nothing at all) otherwise.
 */
export type HealthStatus = "starting" | "healthy" | "unhealthy" | "none";

export interface ContainerState {
  id: string;
  running: boolean;
  health: HealthStatus;
}
