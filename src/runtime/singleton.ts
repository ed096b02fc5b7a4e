import type { ContainerRuntime } from "./container-runtime.js";
import { DockerRuntime } from "./docker-runtime.js";

let _runtime: ContainerRuntime | null = null;

/** The process-wide runtime client, built on first use. */
export function getDefaultRuntime(): ContainerRuntime {
  if (!_runtime) {
    _runtime = new DockerRuntime();
  }
  return _runtime;
}

/** Replace the process-wide runtime client; `null` resets to a lazily built DockerRuntime. */
export function setDefaultRuntime(runtime: ContainerRuntime | null): void {
  _runtime = runtime;
}
