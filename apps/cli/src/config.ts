import { Result } from "better-result";
import { z } from "zod";
import { ValidationError } from "@portbridge/errors";
import type { LogLevel } from "@portbridge/logger";
import {
  DEFAULT_FIREWALL_PROFILES,
  DEFAULT_GUEST_INTERFACE,
  DEFAULT_RULE_PREFIX,
  FIREWALL_PROFILES,
  type FirewallProfile,
} from "@portbridge/network";

export const DEFAULT_PORT = 3000;
export const DEFAULT_GUEST = "Ubuntu";

/**
 * Port number, from a CLI flag or environment variable
 */
export const portSchema = z
  .string()
  .regex(/^\d+$/, "must be an integer")
  .transform((v) => parseInt(v, 10))
  .pipe(z.number().int().min(1).max(65535));

/**
 * Comma-separated firewall profiles, case-insensitive. Duplicates are dropped.
 */
export const profilesSchema = z
  .string()
  .transform((value, ctx): FirewallProfile[] => {
    const profiles: FirewallProfile[] = [];
    for (const raw of value.split(",").map((p) => p.trim()).filter(Boolean)) {
      const profile = FIREWALL_PROFILES.find((p) => p.toLowerCase() === raw.toLowerCase());
      if (!profile) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown profile "${raw}" (expected ${FIREWALL_PROFILES.join(", ")})`,
        });
        return z.NEVER;
      }
      if (!profiles.includes(profile)) {
        profiles.push(profile);
      }
    }
    if (profiles.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one profile is required" });
      return z.NEVER;
    }
    return profiles;
  });

const envSchema = z.object({
  /** Port forwarded when --port is not given. */
  PORTBRIDGE_PORT: portSchema.default(String(DEFAULT_PORT)),

  /** WSL distribution queried when --guest is not given. */
  PORTBRIDGE_GUEST: z.string().min(1).default(DEFAULT_GUEST),

  /** Firewall profiles used when --profiles is not given. */
  PORTBRIDGE_PROFILES: profilesSchema.default(DEFAULT_FIREWALL_PROFILES.join(",")),

  /** Guest interface inspected by the fallback address lookup. */
  PORTBRIDGE_INTERFACE: z.string().min(1).default(DEFAULT_GUEST_INTERFACE),

  /** Firewall rule name prefix; the port is appended. */
  PORTBRIDGE_RULE_PREFIX: z.string().min(1).default(DEFAULT_RULE_PREFIX),

  /** Minimum log level written to the console. */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
});

export interface Config {
  port: number;
  guest: string;
  profiles: FirewallProfile[];
  interfaceName: string;
  rulePrefix: string;
  logLevel: LogLevel;
}

/**
 * Parse and validate environment overrides of the defaults
 */
export function loadConfig(
  raw: Record<string, string | undefined> = process.env
): Result<Config, ValidationError> {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    return Result.err(new ValidationError({ message: `Environment validation failed:\n${formatted}` }));
  }

  const env = result.data;
  return Result.ok({
    port: env.PORTBRIDGE_PORT,
    guest: env.PORTBRIDGE_GUEST,
    profiles: env.PORTBRIDGE_PROFILES,
    interfaceName: env.PORTBRIDGE_INTERFACE,
    rulePrefix: env.PORTBRIDGE_RULE_PREFIX,
    logLevel: env.LOG_LEVEL,
  });
}

