import { z } from "zod";
import { randomPassword } from "./credentials.js";
import { EphemeralPgError } from "./errors.js";

export const sslModeSchema = z.enum(["disable", "allow", "prefer", "require", "verify-ca", "verify-full"]);
export type SslMode = z.infer<typeof sslModeSchema>;

/** Per-instance overrides. Anything left out takes its default. */
export const instanceOptionsSchema = z.object({
  /** Must not contain "?" or "#": connection URLs cannot carry them in the path. */
  dbname: z
    .string()
    .min(1)
    .refine((name) => !/[?#]/.test(name), { message: 'Database name must not contain "?" or "#"' })
    .default("pgtest"),
  user: z.string().min(1).default("pgtest"),
  /** Generated (32 random letters) when omitted. */
  password: z.string().min(1).optional(),
  timezone: z.string().min(1).default("UTC"),
  sslmode: sslModeSchema.default("disable"),
});

export type InstanceOptions = z.input<typeof instanceOptionsSchema>;

export interface InstanceConfig {
  readonly dbname: string;
  readonly user: string;
  readonly password: string;
  readonly timezone: string;
  readonly sslmode: SslMode;
}

export type ParsedInstanceOptions = z.output<typeof instanceOptionsSchema>;

/** Validate and fill defaults. */
export function parseInstanceOptions(options: InstanceOptions = {}): ParsedInstanceOptions {
  const result = instanceOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new EphemeralPgError(`Invalid instance options: ${result.error.message}`, { cause: result.error });
  }
  return result.data;
}

/** The frozen config an instance is created with. A password is generated only when none was given. */
export function toInstanceConfig(
  options: ParsedInstanceOptions,
  generatePassword: () => string = randomPassword,
): InstanceConfig {
  return Object.freeze({
    dbname: options.dbname,
    user: options.user,
    password: options.password ?? generatePassword(),
    timezone: options.timezone,
    sslmode: options.sslmode,
  });
}

export const LOOPBACK_HOST = "127.0.0.1";

/**
 * pg decodes the user and password with decodeURIComponent but the database
 * path with decodeURI, so the path is encoded with the matching encodeURI.
 */
export function buildConnectionString(instance: InstanceConfig, port: number): string {
  const user = encodeURIComponent(instance.user);
  const password = encodeURIComponent(instance.password);
  const dbname = encodeURI(instance.dbname);
  return `postgres://${user}:${password}@${LOOPBACK_HOST}:${port}/${dbname}?sslmode=${instance.sslmode}`;
}
