/**
 * @portbridge/network
 *
 * Host forwarding and firewall management for a guest whose IPv4 address
 * changes across restarts.
 *
 * Features:
 * - Guest address lookup with an interface-detail fallback
 * - Idempotent portproxy entry management (IPv4, optional IPv6-to-IPv4)
 * - One named inbound firewall rule per forwarded port
 *
 * @example
 * ```typescript
 * import {
 *   AddressResolver,
 *   ExecaCommandRunner,
 *   ForwardingRuleManager,
 *   NetshForwardingStore,
 *   WslGuestQuery,
 * } from "@portbridge/network";
 *
 * const runner = new ExecaCommandRunner();
 * const resolver = new AddressResolver({ guestQuery: new WslGuestQuery(runner) });
 * const forwarding = new ForwardingRuleManager(new NetshForwardingStore(runner));
 *
 * const address = await resolver.resolve("Ubuntu");
 * if (address.isOk()) {
 *   await forwarding.remove(3000, false);
 *   await forwarding.add(3000, address.unwrap(), false);
 * }
 * ```
 */

export {
  LOOPBACK_V4,
  ANY_V4,
  ANY_V6,
  FIREWALL_PROFILES,
  DEFAULT_FIREWALL_PROFILES,
  DEFAULT_RULE_PREFIX,
  type ForwardingFamily,
  type ListenKey,
  type ForwardingEntry,
  type ForwardingTable,
  type DeleteOutcome,
  type FirewallProfile,
  type FirewallRuleSpec,
} from "./types.js";

// Process execution
export {
  ExecaCommandRunner,
  combinedOutput,
  type CommandRunner,
  type CommandOutput,
} from "./command.js";

export { tokenize, isIPv4, findIPv4Token, findIPv4CidrToken } from "./ipv4.js";

// Guest address lookup
export { WslGuestQuery, type GuestQuery, type WslGuestQueryConfig } from "./guest.js";
export {
  AddressResolver,
  DEFAULT_GUEST_INTERFACE,
  type AddressResolverConfig,
} from "./resolver.js";

// Forwarding table
export {
  NetshForwardingStore,
  parsePortProxyTable,
  type ForwardingStore,
  type NetshForwardingStoreConfig,
} from "./portproxy.js";
export { ForwardingRuleManager, listenKeysFor } from "./forwarding.js";

// Firewall
export {
  NetshFirewallStore,
  FirewallRuleSynchronizer,
  firewallRuleName,
  listsFirewallRule,
  type FirewallStore,
  type FirewallSyncOutcome,
  type FirewallRuleSynchronizerConfig,
  type NetshFirewallStoreConfig,
} from "./firewall.js";

export { NetSessionPrivilegeCheck, type PrivilegeCheck } from "./privilege.js";

// In-memory stand-ins
export {
  InMemoryForwardingStore,
  InMemoryFirewallStore,
  StaticGuestQuery,
  StaticPrivilegeCheck,
  type StoreOperation,
} from "./memory.js";
