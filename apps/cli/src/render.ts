import { networkInterfaces, type NetworkInterfaceInfo } from "node:os";
import type { ForwardingEntry, ForwardingTable } from "@portbridge/network";
import type { ReconcileResult } from "./services/reconciler.js";

const COLUMN_WIDTH = 16;

function pad(value: string): string {
  return value.padEnd(COLUMN_WIDTH);
}

function renderRows(title: string, entries: ForwardingEntry[]): string[] {
  const lines = [title];
  if (entries.length === 0) {
    lines.push("  (no entries)");
    return lines;
  }
  lines.push(`  ${pad("Listen")}${pad("Port")}${pad("Connect")}Port`);
  for (const entry of entries) {
    lines.push(
      `  ${pad(entry.listenAddress)}${pad(String(entry.listenPort))}${pad(entry.connectAddress)}${entry.connectPort}`
    );
  }
  return lines;
}

/**
 * Both forwarding tables as plain text
 */
export function renderTable(table: ForwardingTable): string {
  return [
    ...renderRows("IPv4 -> IPv4 (v4tov4)", table.v4tov4),
    "",
    ...renderRows("IPv6 -> IPv4 (v6tov4)", table.v6tov4),
  ].join("\n");
}

/**
 * Non-internal IPv4 addresses of the host
 */
export function hostAddresses(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = networkInterfaces()
): string[] {
  const addresses: string[] = [];
  for (const infos of Object.values(interfaces)) {
    for (const info of infos ?? []) {
      if (info.family === "IPv4" && !info.internal) {
        addresses.push(info.address);
      }
    }
  }
  return addresses;
}

export function renderLanHint(port: number, addresses: string[]): string {
  if (addresses.length === 0) {
    return "No LAN address found on this host.";
  }
  return ["Reachable from the LAN at:", ...addresses.map((address) => `  http://${address}:${port}`)].join("\n");
}

/**
 * Everything printed to stdout after an action
 */
export function renderResult(result: ReconcileResult, addresses: string[]): string {
  const sections = [result.summary];

  if (result.firewallRulePresent !== undefined) {
    sections.push(`Firewall rule for port ${result.port}: ${result.firewallRulePresent ? "present" : "absent"}`);
  }

  if (result.table) {
    sections.push(renderTable(result.table));
  }

  if (result.ok && (result.action === "add" || result.action === "refresh")) {
    sections.push(renderLanHint(result.port, addresses));
  }

  return sections.join("\n\n");
}
