import { parseArgs, type ParseArgsConfig } from "node:util";
import { Result } from "better-result";
import { ValidationError } from "@portbridge/errors";
import type { FirewallProfile } from "@portbridge/network";
import { portSchema, profilesSchema, type Config } from "./config.js";

export const ACTIONS = ["add", "refresh", "remove", "show"] as const;

export type Action = (typeof ACTIONS)[number];

export interface CliOptions {
  action: Action;
  port: number;
  guest: string;
  ipv6: boolean;
  profiles: FirewallProfile[];
  /** false when --no-firewall is given */
  firewall: boolean;
  verbose: boolean;
}

export type ParsedArgs = { kind: "help" } | { kind: "run"; options: CliOptions };

export const USAGE = `Usage: portbridge [add|refresh|remove|show] [options]

Forward a TCP port from the host's interfaces to a WSL guest.

Actions:
  add        Look up the guest address and (re)create forwarding (default)
  refresh    Same as add; run after the guest restarts with a new address
  remove     Delete the forwarding entries and the firewall rule
  show       Print the current forwarding tables

Options:
  -p, --port <n>          Port to forward (default: 3000)
  -g, --guest <name>      WSL distribution (default: Ubuntu)
      --ipv6              Also forward IPv6 (::) to the guest's IPv4 address
      --profiles <list>   Firewall profiles, comma-separated (default: Private,Domain)
      --no-firewall       Do not manage the firewall rule
  -v, --verbose           Write debug logs
  -h, --help              Show this help
`;

const ARGS_CONFIG = {
  allowPositionals: true,
  strict: true,
  options: {
    port: { type: "string", short: "p" },
    guest: { type: "string", short: "g" },
    ipv6: { type: "boolean" },
    profiles: { type: "string" },
    "no-firewall": { type: "boolean" },
    verbose: { type: "boolean", short: "v" },
    help: { type: "boolean", short: "h" },
  },
} satisfies ParseArgsConfig;

function isAction(value: string): value is Action {
  return ACTIONS.some((action) => action === value);
}

/**
 * Parse argv (without the node and script entries) on top of configured defaults
 */
export function parseCliArgs(argv: string[], config: Config): Result<ParsedArgs, ValidationError> {
  let parsed: ReturnType<typeof parseArgs<typeof ARGS_CONFIG>>;
  try {
    parsed = parseArgs({ ...ARGS_CONFIG, args: argv });
  } catch (error) {
    return Result.err(
      new ValidationError({ message: error instanceof Error ? error.message : String(error) })
    );
  }

  const { values, positionals } = parsed;

  if (values.help) {
    return Result.ok({ kind: "help" });
  }

  if (positionals.length > 1) {
    return Result.err(new ValidationError({ message: `Expected one action, got: ${positionals.join(" ")}` }));
  }

  const action = positionals[0] ?? "add";
  if (!isAction(action)) {
    return Result.err(
      new ValidationError({ message: `Unknown action "${action}" (expected ${ACTIONS.join(", ")})` })
    );
  }

  let port = config.port;
  if (values.port !== undefined) {
    const result = portSchema.safeParse(values.port);
    if (!result.success) {
      return Result.err(
        new ValidationError({ message: `Invalid --port "${values.port}": ${result.error.issues[0].message}` })
      );
    }
    port = result.data;
  }

  let profiles = config.profiles;
  if (values.profiles !== undefined) {
    const result = profilesSchema.safeParse(values.profiles);
    if (!result.success) {
      return Result.err(
        new ValidationError({ message: `Invalid --profiles: ${result.error.issues[0].message}` })
      );
    }
    profiles = result.data;
  }

  const guest = values.guest ?? config.guest;
  if (guest.trim() === "") {
    return Result.err(new ValidationError({ message: "--guest must not be empty" }));
  }

  return Result.ok({
    kind: "run",
    options: {
      action,
      port,
      guest,
      ipv6: values.ipv6 ?? false,
      profiles,
      firewall: !(values["no-firewall"] ?? false),
      verbose: values.verbose ?? false,
    },
  });
}
