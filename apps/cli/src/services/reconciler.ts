import {
  PrivilegeError,
  type FirewallError,
  type ForwardingError,
  type PortbridgeError,
} from "@portbridge/errors";
import { silentLogger, type Logger } from "@portbridge/logger";
import type {
  AddressResolver,
  FirewallProfile,
  FirewallRuleSynchronizer,
  ForwardingRuleManager,
  ForwardingTable,
  PrivilegeCheck,
} from "@portbridge/network";
import type { Action } from "../args.js";

export interface ReconcileRequest {
  action: Action;
  port: number;
  guest: string;
  ipv6: boolean;
  profiles: FirewallProfile[];
  /** Manage the firewall rule (false skips it on remove and clears it on add) */
  firewall: boolean;
}

export interface ReconcileResult {
  ok: boolean;
  action: Action;
  port: number;
  /** Address the entries now target (add/refresh only) */
  guestAddress?: string;
  summary: string;
  /** Forwarding tables after the operation; absent if they could not be read */
  table?: ForwardingTable;
  /** Whether the port's firewall rule exists (show only) */
  firewallRulePresent?: boolean;
  error?: PortbridgeError;
}

export interface ReconcilerDeps {
  privilege: PrivilegeCheck;
  resolver: AddressResolver;
  forwarding: ForwardingRuleManager;
  firewall: FirewallRuleSynchronizer;
  logger?: Logger;
}

type Outcome = Omit<ReconcileResult, "action" | "port" | "table">;

/**
 * Runs one action against the host stores.
 *
 * Every action needs elevation and checks it before touching anything.
 * add, refresh and remove end by reading back the forwarding tables, whether
 * or not they succeeded. Nothing is rolled back on failure.
 */
export class Reconciler {
  private readonly logger: Logger;

  constructor(private readonly deps: ReconcilerDeps) {
    this.logger = (deps.logger ?? silentLogger).child({ component: "reconciler" });
  }

  async run(request: ReconcileRequest): Promise<ReconcileResult> {
    const { action, port } = request;
    this.logger.info("Reconciling", { ...request });

    if (!(await this.deps.privilege.isElevated())) {
      const error = new PrivilegeError({
        message: "Administrator rights are required; run from an elevated shell",
      });
      this.logger.error("Not elevated", { action });
      return { ok: false, action, port, summary: error.message, error };
    }

    let outcome: Outcome;
    switch (action) {
      case "show":
        outcome = await this.inspect(request);
        break;
      case "remove":
        outcome = await this.tearDown(request);
        break;
      case "add":
      case "refresh":
        outcome = await this.establish(request);
        break;
    }

    const table = await this.deps.forwarding.show();
    if (table.isErr()) {
      this.logger.warn("Could not read forwarding tables", { error: table.error.message });
      if (action === "show" && outcome.ok) {
        return { ...outcome, ok: false, action, port, summary: table.error.message, error: table.error };
      }
      return { ...outcome, action, port };
    }

    return { ...outcome, action, port, table: table.unwrap() };
  }

  private async inspect(request: ReconcileRequest): Promise<Outcome> {
    if (!request.firewall) {
      return { ok: true, summary: `Forwarding tables for port ${request.port}` };
    }

    const status = await this.deps.firewall.status(request.port);
    if (status.isErr()) {
      return this.failed(status.error);
    }
    return {
      ok: true,
      summary: `Forwarding tables for port ${request.port}`,
      firewallRulePresent: status.unwrap(),
    };
  }

  private async tearDown(request: ReconcileRequest): Promise<Outcome> {
    const { port, ipv6 } = request;

    const removed = await this.deps.forwarding.remove(port, ipv6);
    if (removed.isErr()) {
      return this.failed(removed.error);
    }

    if (!request.firewall) {
      return { ok: true, summary: `Removed forwarding for port ${port}` };
    }

    const synced = await this.deps.firewall.sync(port, request.profiles, false);
    if (synced.isErr()) {
      return this.failed(synced.error);
    }
    return {
      ok: true,
      summary: `Removed forwarding for port ${port} and firewall rule "${synced.unwrap().ruleName}"`,
    };
  }

  /**
   * add and refresh. Resolution happens before anything is removed, so a
   * guest that cannot be reached leaves the existing entries in place.
   */
  private async establish(request: ReconcileRequest): Promise<Outcome> {
    const { port, guest, ipv6 } = request;

    const resolved = await this.deps.resolver.resolve(guest);
    if (resolved.isErr()) {
      this.logger.error("Guest address not found", { guest });
      return {
        ok: false,
        summary: `Could not find an IPv4 address for guest "${guest}": ${resolved.error.message}`,
        error: resolved.error,
      };
    }
    const guestAddress = resolved.unwrap();
    this.logger.info("Guest address resolved", { guest, guestAddress });

    const removed = await this.deps.forwarding.remove(port, ipv6);
    if (removed.isErr()) {
      return { ...this.failed(removed.error), guestAddress };
    }

    const added = await this.deps.forwarding.add(port, guestAddress, ipv6);
    if (added.isErr()) {
      return { ...this.failed(added.error), guestAddress };
    }

    const families = ipv6 ? "IPv4 and IPv6" : "IPv4";
    const forwarded = `Forwarding port ${port} (${families}) to ${guestAddress}:${port}`;

    const synced = await this.deps.firewall.sync(port, request.profiles, request.firewall);
    if (synced.isErr()) {
      return {
        ...this.failed(synced.error),
        guestAddress,
        summary: `${forwarded}; ${synced.error.message}`,
      };
    }

    const { ruleName, removed: ruleRemoved } = synced.unwrap();
    let firewall = `firewall rule "${ruleName}" allows ${request.profiles.join(", ")}`;
    if (!request.firewall) {
      firewall =
        ruleRemoved === "deleted"
          ? `firewall management disabled; removed rule "${ruleName}"`
          : `firewall management disabled; no rule "${ruleName}"`;
    }

    return { ok: true, guestAddress, summary: `${forwarded}; ${firewall}` };
  }

  private failed(error: ForwardingError | FirewallError): Outcome {
    this.logger.error(error.message, { tag: error._tag });
    return { ok: false, summary: error.message, error };
  }
}
