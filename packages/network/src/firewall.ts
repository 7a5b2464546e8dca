/**
 * Firewall rule synchronization
 *
 * Keeps at most one inbound allow-rule per forwarded port. The host firewall
 * accepts duplicate names, so uniqueness comes from delete-then-create here.
 */

import { Result } from "better-result";
import { FirewallError, type CommandError } from "@portbridge/errors";
import { silentLogger, type Logger } from "@portbridge/logger";
import { combinedOutput, type CommandRunner } from "./command.js";
import {
  DEFAULT_RULE_PREFIX,
  type DeleteOutcome,
  type FirewallProfile,
  type FirewallRuleSpec,
} from "./types.js";

export interface FirewallStore {
  /** Delete every rule with this name. No matching rule is "absent", not an error. */
  deleteRule(name: string): Promise<Result<DeleteOutcome, FirewallError>>;
  addRule(rule: FirewallRuleSpec): Promise<Result<void, FirewallError>>;
  hasRule(name: string): Promise<Result<boolean, FirewallError>>;
}

/**
 * Rule name for a port: "<prefix> <port>"
 */
export function firewallRuleName(port: number, prefix: string = DEFAULT_RULE_PREFIX): string {
  return `${prefix} ${port}`;
}

const NO_MATCHING_RULES = "no rules match the specified criteria";

// "<label>: <value>" lines of `show rule` output; labels are localized, values are not
const RULE_FIELD = /^[^:]+:\s*(.+)$/;

/**
 * Whether `netsh advfirewall firewall show rule` output lists a rule by name.
 * Matches the value of any "label: value" line exactly.
 */
export function listsFirewallRule(output: string, name: string): boolean {
  return output.split(/\r?\n/).some((line) => line.trim().match(RULE_FIELD)?.[1] === name);
}

export interface NetshFirewallStoreConfig {
  /**
   * netsh binary path (defaults to "netsh.exe")
   */
  netshBinary?: string;
}

/**
 * FirewallStore backed by `netsh advfirewall firewall`
 */
export class NetshFirewallStore implements FirewallStore {
  private netshBinary: string;

  constructor(
    private runner: CommandRunner,
    config: NetshFirewallStoreConfig = {}
  ) {
    this.netshBinary = config.netshBinary ?? "netsh.exe";
  }

  async deleteRule(name: string): Promise<Result<DeleteOutcome, FirewallError>> {
    const result = await this.runner.run(this.netshBinary, [
      "advfirewall",
      "firewall",
      "delete",
      "rule",
      `name=${name}`,
    ]);

    if (result.isOk()) {
      return Result.ok("deleted");
    }

    if (combinedOutput(result.error).toLowerCase().includes(NO_MATCHING_RULES)) {
      return Result.ok("absent");
    }

    const listed = await this.isListed(name);
    if (listed.isOk() && !listed.unwrap()) {
      return Result.ok("absent");
    }

    return Result.err(
      new FirewallError({
        message: `Failed to delete firewall rule "${name}"`,
        operation: "delete",
        ruleName: name,
        cause: result.error,
      })
    );
  }

  async addRule(rule: FirewallRuleSpec): Promise<Result<void, FirewallError>> {
    const result = await this.runner.run(this.netshBinary, [
      "advfirewall",
      "firewall",
      "add",
      "rule",
      `name=${rule.name}`,
      `dir=${rule.direction}`,
      `action=${rule.action}`,
      `protocol=${rule.protocol}`,
      `localport=${rule.port}`,
      `profile=${rule.profiles.map((p) => p.toLowerCase()).join(",")}`,
    ]);

    if (result.isErr()) {
      return Result.err(
        new FirewallError({
          message: `Failed to add firewall rule "${rule.name}"`,
          operation: "add",
          ruleName: rule.name,
          cause: result.error,
        })
      );
    }

    return Result.ok(undefined);
  }

  /**
   * Look the rule up in the full listing. Used when a failure's message is
   * not the English "no rules match" text.
   */
  private async isListed(name: string): Promise<Result<boolean, CommandError>> {
    const result = await this.runner.run(this.netshBinary, [
      "advfirewall",
      "firewall",
      "show",
      "rule",
      "name=all",
    ]);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    return Result.ok(listsFirewallRule(result.unwrap().stdout, name));
  }

  async hasRule(name: string): Promise<Result<boolean, FirewallError>> {
    const result = await this.runner.run(this.netshBinary, [
      "advfirewall",
      "firewall",
      "show",
      "rule",
      `name=${name}`,
    ]);

    if (result.isOk()) {
      return Result.ok(true);
    }

    if (combinedOutput(result.error).toLowerCase().includes(NO_MATCHING_RULES)) {
      return Result.ok(false);
    }

    const listed = await this.isListed(name);
    if (listed.isOk()) {
      return Result.ok(listed.unwrap());
    }

    return Result.err(
      new FirewallError({
        message: `Failed to look up firewall rule "${name}"`,
        operation: "show",
        ruleName: name,
        cause: result.error,
      })
    );
  }
}

export interface FirewallSyncOutcome {
  ruleName: string;
  removed: DeleteOutcome;
  created: boolean;
}

export interface FirewallRuleSynchronizerConfig {
  store: FirewallStore;
  /** Rule name prefix (default: "WSL Port") */
  rulePrefix?: string;
  logger?: Logger;
}

export class FirewallRuleSynchronizer {
  private readonly store: FirewallStore;
  private readonly rulePrefix: string;
  private readonly logger: Logger;

  constructor(config: FirewallRuleSynchronizerConfig) {
    this.store = config.store;
    this.rulePrefix = config.rulePrefix ?? DEFAULT_RULE_PREFIX;
    this.logger = (config.logger ?? silentLogger).child({ component: "firewall" });
  }

  ruleName(port: number): string {
    return firewallRuleName(port, this.rulePrefix);
  }

  /**
   * Delete the port's rule, then recreate it when enabled
   */
  async sync(
    port: number,
    profiles: FirewallProfile[],
    enabled: boolean
  ): Promise<Result<FirewallSyncOutcome, FirewallError>> {
    const ruleName = this.ruleName(port);

    const removed = await this.store.deleteRule(ruleName);
    if (removed.isErr()) {
      this.logger.error("Failed to delete firewall rule", { ruleName, error: removed.error.message });
      return Result.err(removed.error);
    }
    this.logger.debug("Firewall rule cleared", { ruleName, outcome: removed.unwrap() });

    if (!enabled) {
      return Result.ok({ ruleName, removed: removed.unwrap(), created: false });
    }

    const added = await this.store.addRule({
      name: ruleName,
      direction: "in",
      protocol: "TCP",
      port,
      profiles,
      action: "allow",
    });
    if (added.isErr()) {
      this.logger.error("Failed to add firewall rule", { ruleName, error: added.error.message });
      return Result.err(added.error);
    }
    this.logger.info("Firewall rule added", { ruleName, port, profiles });

    return Result.ok({ ruleName, removed: removed.unwrap(), created: true });
  }

  /**
   * Whether the port's rule currently exists
   */
  async status(port: number): Promise<Result<boolean, FirewallError>> {
    return this.store.hasRule(this.ruleName(port));
  }
}
