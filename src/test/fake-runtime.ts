import { RuntimeNotFoundError } from "../instance/errors.js";
import type { DatabasePinger } from "../instance/pinger.js";
import type { ContainerRuntime, ContainerSpec, ContainerState, HealthStatus } from "../runtime/container-runtime.js";

export type RuntimeOperation = keyof ContainerRuntime;

interface FakeContainer {
  spec: ContainerSpec;
  running: boolean;
}

/**
 * In-memory ContainerRuntime. Every call is appended to `calls` as
 * "<operation> <argument>" so tests can assert ordering.
 */
export class FakeRuntime implements ContainerRuntime {
  /** Images in the local store. */
  readonly images = new Set<string>();
  /** Images a pull can fetch. */
  readonly remoteImages = new Set<string>();
  readonly containers = new Map<string, FakeContainer>();
  readonly calls: string[] = [];
  /** Every spec passed to createContainer, including containers since removed. */
  readonly created: ContainerSpec[] = [];
  /** Errors thrown by an operation on every call until deleted. */
  readonly failures = new Map<RuntimeOperation, Error>();
  /** Health reported by successive inspectContainer calls; the last entry repeats. */
  healthSequence: HealthStatus[] = ["healthy"];

  private healthIndex = 0;
  private nextId = 1;

  async inspectImage(image: string): Promise<void> {
    this.record("inspectImage", image);
    if (!this.images.has(image)) throw new RuntimeNotFoundError("image", image);
  }

  async pullImage(image: string, signal?: AbortSignal): Promise<void> {
    this.record("pullImage", image);
    signal?.throwIfAborted();
    if (!this.remoteImages.has(image)) throw new Error(`manifest for ${image} not found`);
    this.images.add(image);
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    this.record("createContainer", spec.image);
    this.created.push(spec);
    const id = `container-${this.nextId++}`;
    this.containers.set(id, { spec, running: false });
    return id;
  }

  async startContainer(id: string): Promise<void> {
    this.record("startContainer", id);
    this.get(id).running = true;
  }

  async inspectContainer(id: string): Promise<ContainerState> {
    this.record("inspectContainer", id);
    const container = this.get(id);
    const last = this.healthSequence.length - 1;
    const health = this.healthSequence[Math.min(this.healthIndex++, last)] ?? "none";
    return { id, running: container.running, health };
  }

  async stopContainer(id: string): Promise<void> {
    this.record("stopContainer", id);
    this.get(id).running = false;
  }

  async removeContainer(id: string): Promise<void> {
    this.record("removeContainer", id);
    this.get(id);
    this.containers.delete(id);
  }

  /** The ContainerSpec passed to the most recent createContainer call. */
  lastSpec(): ContainerSpec {
    const spec = this.created[this.created.length - 1];
    if (!spec) throw new Error("no container has been created");
    return spec;
  }

  private record(op: RuntimeOperation, arg: string): void {
    this.calls.push(`${op} ${arg}`);
    const failure = this.failures.get(op);
    if (failure) throw failure;
  }

  private get(id: string): FakeContainer {
    const container = this.containers.get(id);
    if (!container) throw new RuntimeNotFoundError("container", id);
    return container;
  }
}

/**
 * DatabasePinger that fails `failures` times before succeeding. Pass the
 * runtime's call log to interleave "ping" entries with runtime calls.
 */
export class FakePinger implements DatabasePinger {
  readonly pinged: string[] = [];

  constructor(
    private readonly log: string[] = [],
    private failures = 0,
    readonly error: Error = new Error("connection refused"),
  ) {}

  async ping(connectionString: string): Promise<void> {
    this.pinged.push(connectionString);
    this.log.push("ping");
    if (this.failures > 0) {
      this.failures--;
      throw this.error;
    }
  }
}
