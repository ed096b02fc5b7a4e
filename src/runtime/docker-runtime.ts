import Docker from "dockerode";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { RuntimeNotFoundError } from "../instance/errors.js";
import type { ContainerRuntime, ContainerSpec, ContainerState, HealthStatus } from "./container-runtime.js";

const NANOS_PER_MS = 1_000_000;

/**
 * ContainerRuntime over the Docker Engine API. Uses the Docker SDK
 * exclusively -- no child_process.exec.
 */
export class DockerRuntime implements ContainerRuntime {
  readonly docker: Docker;

  constructor(docker?: Docker) {
    this.docker = docker ?? createDockerClient(config.docker.socketPath);
  }

  async inspectImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
    } catch (err) {
      if (isNotFound(err)) throw new RuntimeNotFoundError("image", image, { cause: err });
      throw err;
    }
  }

  async pullImage(image: string, signal?: AbortSignal): Promise<void> {
    logger.info(`Pulling image ${image}`);
    const stream = await this.docker.pull(image, { abortSignal: signal });
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    const { healthCheck, portBinding } = spec;
    const portKey = `${portBinding.containerPort}/tcp`;

    const container = await this.docker.createContainer({
      Image: spec.image,
      Env: Object.entries(spec.env).map(([k, v]) => `${k}=${v}`),
      Labels: spec.labels,
      ExposedPorts: { [portKey]: {} },
      Healthcheck: {
        Test: healthCheck.test,
        Interval: healthCheck.intervalMs * NANOS_PER_MS,
        Timeout: healthCheck.timeoutMs * NANOS_PER_MS,
        Retries: healthCheck.retries,
      },
      HostConfig: {
        PortBindings: {
          [portKey]: [{ HostIp: portBinding.hostIp, HostPort: String(portBinding.hostPort) }],
        },
      },
    });

    logger.info(`Created container ${container.id} from ${spec.image}`);
    return container.id;
  }

  async startContainer(id: string): Promise<void> {
    await this.withContainer(id, (c) => c.start());
  }

  async inspectContainer(id: string): Promise<ContainerState> {
    const info = await this.withContainer(id, (c) => c.inspect());
    return {
      id: info.Id,
      running: info.State.Running,
      health: toHealthStatus(info.State.Health?.Status),
    };
  }

  async stopContainer(id: string): Promise<void> {
    await this.withContainer(id, (c) => c.stop());
  }

  async removeContainer(id: string): Promise<void> {
    await this.withContainer(id, (c) => c.remove());
  }

  private async withContainer<T>(id: string, fn: (container: Docker.Container) => Promise<T>): Promise<T> {
    try {
      return await fn(this.docker.getContainer(id));
    } catch (err) {
      if (isNotFound(err)) throw new RuntimeNotFoundError("container", id, { cause: err });
      throw err;
    }
  }
}

export function createDockerClient(socketPath?: string): Docker {
  return socketPath ? new Docker({ socketPath }) : new Docker();
}

/** dockerode surfaces the Engine API status code on its errors. */
export function isNotFound(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("statusCode" in err)) return false;
  return err.statusCode === 404;
}

function toHealthStatus(status: string | undefined): HealthStatus {
  switch (status) {
    case "starting":
    case "healthy":
    case "unhealthy":
      return status;
    default:
      return "none";
  }
}
