/**
 * Forwarding table family: IPv4 listener to IPv4 target, or IPv6 listener to IPv4 target
 */
export type ForwardingFamily = "v4tov4" | "v6tov4";

/** Host loop-back listen address */
export const LOOPBACK_V4 = "127.0.0.1";

/** IPv4 any-address listen address */
export const ANY_V4 = "0.0.0.0";

/** IPv6 any-address listen address */
export const ANY_V6 = "::";

/**
 * Key of a forwarding entry in the host table
 */
export interface ListenKey {
  family: ForwardingFamily;
  listenAddress: string;
  listenPort: number;
}

/**
 * A forwarding entry: (listen address, listen port) relays to (connect address, connect port)
 */
export interface ForwardingEntry extends ListenKey {
  connectAddress: string;
  connectPort: number;
}

export interface ForwardingTable {
  v4tov4: ForwardingEntry[];
  v6tov4: ForwardingEntry[];
}

/**
 * Result of an idempotent delete. "absent" means there was nothing to delete.
 */
export type DeleteOutcome = "deleted" | "absent";

export const FIREWALL_PROFILES = ["Domain", "Private", "Public"] as const;

export type FirewallProfile = (typeof FIREWALL_PROFILES)[number];

export const DEFAULT_FIREWALL_PROFILES: readonly FirewallProfile[] = ["Private", "Domain"];

/** Prefix of the firewall rule name; the port number is appended */
export const DEFAULT_RULE_PREFIX = "WSL Port";

/**
 * Inbound allow-rule for one forwarded TCP port
 */
export interface FirewallRuleSpec {
  name: string;
  direction: "in";
  protocol: "TCP";
  port: number;
  profiles: FirewallProfile[];
  action: "allow";
}
