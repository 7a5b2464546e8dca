/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// Caller is not elevated
export const PrivilegeError = TaggedError("PrivilegeError")<{
  message: string;
}>();

export type PrivilegeError = InstanceType<typeof PrivilegeError>;

// Guest address could not be discovered by either lookup
export const ResolutionError = TaggedError("ResolutionError")<{
  message: string;
  guest: string;
}>();

export type ResolutionError = InstanceType<typeof ResolutionError>;

// Forwarding table rejected a create/delete
export const ForwardingError = TaggedError("ForwardingError")<{
  message: string;
  operation: "add" | "delete" | "show";
  family: "v4tov4" | "v6tov4";
  listenAddress: string;
  port: number;
  cause?: unknown;
}>();

export type ForwardingError = InstanceType<typeof ForwardingError>;

// Firewall store rejected a rule create/delete
export const FirewallError = TaggedError("FirewallError")<{
  message: string;
  operation: "add" | "delete" | "show";
  ruleName: string;
  cause?: unknown;
}>();

export type FirewallError = InstanceType<typeof FirewallError>;

// External process failed or could not be spawned
export const CommandError = TaggedError("CommandError")<{
  message: string;
  file: string;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
}>();

export type CommandError = InstanceType<typeof CommandError>;

// Invalid arguments or configuration
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Union type for all portbridge errors
export type PortbridgeError =
  | PrivilegeError
  | ResolutionError
  | ForwardingError
  | FirewallError
  | CommandError
  | ValidationError;

/**
 * Get the process exit code for an error
 */
export function exitCodeFor(error: PortbridgeError): number {
  switch (error._tag) {
    case "ValidationError":
      return 2;
    case "PrivilegeError":
      return 3;
    case "ResolutionError":
      return 4;
    case "ForwardingError":
      return 5;
    case "FirewallError":
      return 6;
    case "CommandError":
    default:
      return 1;
  }
}
