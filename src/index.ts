export { config } from "./config/index.js";
export type { Config } from "./config/index.js";
export { findFreePort, PASSWORD_LENGTH, randomPassword } from "./instance/credentials.js";
export {
  ContainerUnhealthyError,
  EphemeralPgError,
  ReadinessTimeoutError,
  RuntimeNotFoundError,
  StartupCancelledError,
  StartupError,
  TeardownError,
} from "./instance/errors.js";
export type { ReadinessPhase, StartupPhase, TeardownStep } from "./instance/errors.js";
export { ensureImage, imageReference } from "./instance/image-resolver.js";
export { PgPinger } from "./instance/pinger.js";
export type { DatabasePinger } from "./instance/pinger.js";
export {
  MANAGED_LABEL,
  POSTGRES_PORT,
  PostgresContainer,
  startPostgresContainer,
} from "./instance/postgres-container.js";
export type { StartOptions } from "./instance/postgres-container.js";
export { waitUntilReady } from "./instance/readiness.js";
export type { ReadinessOptions } from "./instance/readiness.js";
export { buildConnectionString, instanceOptionsSchema, sslModeSchema } from "./instance/types.js";
export type { InstanceConfig, InstanceOptions, SslMode } from "./instance/types.js";
export type {
  ContainerRuntime,
  ContainerSpec,
  ContainerState,
  HealthCheckSpec,
  HealthStatus,
  PortBinding,
} from "./runtime/container-runtime.js";
export { DockerRuntime } from "./runtime/docker-runtime.js";
export { getDefaultRuntime, setDefaultRuntime } from "./runtime/singleton.js";
export { pgExecutor } from "./seed/executor.js";
export type { PgQueryable, SqlExecutor } from "./seed/executor.js";
export { MigrationError, runMigrations } from "./seed/migrations.js";
export { applyScenario, loadScenario, parseScenario, ScenarioError } from "./seed/scenario.js";
export type { Scenario } from "./seed/scenario.js";
export { usePostgresContainer } from "./testing/index.js";
export type { PostgresSuite, SuiteHooks } from "./testing/index.js";
