/**
 * In-memory stores for tests.
 *
 * They mirror the host stores' behavior: adding a forwarding entry replaces
 * one with the same key, and the firewall accepts duplicate rule names.
 */

import { Result } from "better-result";
import { CommandError, FirewallError, ForwardingError } from "@portbridge/errors";
import type { FirewallStore } from "./firewall.js";
import type { GuestQuery } from "./guest.js";
import type { ForwardingStore } from "./portproxy.js";
import type { PrivilegeCheck } from "./privilege.js";
import type {
  DeleteOutcome,
  ForwardingEntry,
  ForwardingFamily,
  FirewallRuleSpec,
  ListenKey,
} from "./types.js";

export type StoreOperation =
  | { op: "delete"; key: ListenKey }
  | { op: "add"; entry: ForwardingEntry }
  | { op: "deleteRule"; name: string }
  | { op: "addRule"; rule: FirewallRuleSpec };

function keyOf(key: ListenKey): string {
  return `${key.family}|${key.listenAddress}|${key.listenPort}`;
}

export class InMemoryForwardingStore implements ForwardingStore {
  private entries = new Map<string, ForwardingEntry>();
  readonly operations: StoreOperation[] = [];
  /** When set, matching mutations fail */
  failWhen?: (operation: StoreOperation) => boolean;

  constructor(initial: ForwardingEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(keyOf(entry), entry);
    }
  }

  async delete(key: ListenKey): Promise<Result<DeleteOutcome, ForwardingError>> {
    const operation: StoreOperation = { op: "delete", key };
    this.operations.push(operation);
    if (this.failWhen?.(operation)) {
      return Result.err(
        new ForwardingError({
          message: `Failed to delete ${key.family} entry ${key.listenAddress}:${key.listenPort}`,
          operation: "delete",
          family: key.family,
          listenAddress: key.listenAddress,
          port: key.listenPort,
        })
      );
    }
    return Result.ok(this.entries.delete(keyOf(key)) ? "deleted" : "absent");
  }

  async add(entry: ForwardingEntry): Promise<Result<void, ForwardingError>> {
    const operation: StoreOperation = { op: "add", entry };
    this.operations.push(operation);
    if (this.failWhen?.(operation)) {
      return Result.err(
        new ForwardingError({
          message: `Failed to add ${entry.family} entry ${entry.listenAddress}:${entry.listenPort}`,
          operation: "add",
          family: entry.family,
          listenAddress: entry.listenAddress,
          port: entry.listenPort,
        })
      );
    }
    this.entries.set(keyOf(entry), { ...entry });
    return Result.ok(undefined);
  }

  async list(family: ForwardingFamily): Promise<Result<ForwardingEntry[], ForwardingError>> {
    return Result.ok([...this.entries.values()].filter((entry) => entry.family === family));
  }
}

export class InMemoryFirewallStore implements FirewallStore {
  readonly rules: FirewallRuleSpec[] = [];
  readonly operations: StoreOperation[] = [];
  failWhen?: (operation: StoreOperation) => boolean;

  async deleteRule(name: string): Promise<Result<DeleteOutcome, FirewallError>> {
    const operation: StoreOperation = { op: "deleteRule", name };
    this.operations.push(operation);
    if (this.failWhen?.(operation)) {
      return Result.err(
        new FirewallError({ message: `Failed to delete firewall rule "${name}"`, operation: "delete", ruleName: name })
      );
    }
    const before = this.rules.length;
    for (let i = this.rules.length - 1; i >= 0; i--) {
      if (this.rules[i].name === name) {
        this.rules.splice(i, 1);
      }
    }
    return Result.ok(this.rules.length < before ? "deleted" : "absent");
  }

  async addRule(rule: FirewallRuleSpec): Promise<Result<void, FirewallError>> {
    const operation: StoreOperation = { op: "addRule", rule };
    this.operations.push(operation);
    if (this.failWhen?.(operation)) {
      return Result.err(
        new FirewallError({ message: `Failed to add firewall rule "${rule.name}"`, operation: "add", ruleName: rule.name })
      );
    }
    this.rules.push({ ...rule, profiles: [...rule.profiles] });
    return Result.ok(undefined);
  }

  async hasRule(name: string): Promise<Result<boolean, FirewallError>> {
    return Result.ok(this.rules.some((rule) => rule.name === name));
  }

  rulesNamed(name: string): FirewallRuleSpec[] {
    return this.rules.filter((rule) => rule.name === name);
  }
}

/**
 * GuestQuery returning fixed output. null makes the query fail.
 */
export class StaticGuestQuery implements GuestQuery {
  calls: Array<"listAddresses" | "describeInterface"> = [];

  constructor(
    public listing: string | null,
    public detail: string | null = null
  ) {}

  async listAddresses(guest: string): Promise<Result<string, CommandError>> {
    this.calls.push("listAddresses");
    return this.answer(this.listing, guest, ["hostname", "-I"]);
  }

  async describeInterface(guest: string, interfaceName: string): Promise<Result<string, CommandError>> {
    this.calls.push("describeInterface");
    return this.answer(this.detail, guest, ["ip", "-4", "addr", "show", interfaceName]);
  }

  private answer(output: string | null, guest: string, cmd: string[]): Result<string, CommandError> {
    if (output === null) {
      return Result.err(
        new CommandError({
          message: `Command failed in guest ${guest}`,
          file: "wsl.exe",
          args: ["-d", guest, "--", ...cmd],
          exitCode: 1,
          stdout: "",
          stderr: "",
        })
      );
    }
    return Result.ok(output);
  }
}

export class StaticPrivilegeCheck implements PrivilegeCheck {
  constructor(public elevated: boolean) {}

  async isElevated(): Promise<boolean> {
    return this.elevated;
  }
}
