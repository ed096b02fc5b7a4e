import { logger } from "../config/logger.js";
import type { ContainerRuntime } from "../runtime/container-runtime.js";
import { RuntimeNotFoundError } from "./errors.js";

/**
 * Make sure `image` is in the local store. Inspects first and pulls only on a
 * not-found; a single pull attempt, no retries.
 *
 * @returns whether a pull was needed
 */
export async function ensureImage(runtime: ContainerRuntime, image: string, signal?: AbortSignal): Promise<boolean> {
  try {
    await runtime.inspectImage(image);
    logger.debug(`Image ${image} already present`);
    return false;
  } catch (err) {
    if (!(err instanceof RuntimeNotFoundError)) throw err;
  }

  await runtime.pullImage(image, signal);
  logger.info(`Pulled image ${image}`);
  return true;
}

export function imageReference(repository: string, version: string): string {
  return `${repository}:${version}`;
}
