import { describe, it, expect } from "vitest";
import type { NetworkInterfaceInfo } from "node:os";
import { hostAddresses, renderLanHint, renderResult, renderTable } from "../render.js";

const TABLE = {
  v4tov4: [
    { family: "v4tov4" as const, listenAddress: "0.0.0.0", listenPort: 3000, connectAddress: "172.20.10.5", connectPort: 3000 },
  ],
  v6tov4: [],
};

describe("renderTable", () => {
  it("renders both families", () => {
    expect(renderTable(TABLE)).toBe(
      [
        "IPv4 -> IPv4 (v4tov4)",
        "  Listen          Port            Connect         Port",
        "  0.0.0.0         3000            172.20.10.5     3000",
        "",
        "IPv6 -> IPv4 (v6tov4)",
        "  (no entries)",
      ].join("\n")
    );
  });
});

describe("hostAddresses", () => {
  it("keeps external IPv4 addresses only", () => {
    const base = { netmask: "255.255.255.0", mac: "00:00:00:00:00:00", cidr: null };
    const interfaces: Record<string, NetworkInterfaceInfo[]> = {
      lo: [{ ...base, address: "127.0.0.1", family: "IPv4", internal: true }],
      Ethernet: [
        { ...base, address: "192.168.1.20", family: "IPv4", internal: false },
        { ...base, address: "fe80::1", family: "IPv6", internal: false, scopeid: 0 },
      ],
    };

    expect(hostAddresses(interfaces)).toEqual(["192.168.1.20"]);
  });
});

describe("renderLanHint", () => {
  it("lists a URL per address", () => {
    expect(renderLanHint(3000, ["192.168.1.20", "10.0.0.4"])).toBe(
      "Reachable from the LAN at:\n  http://192.168.1.20:3000\n  http://10.0.0.4:3000"
    );
  });

  it("says so when there is no address", () => {
    expect(renderLanHint(3000, [])).toBe("No LAN address found on this host.");
  });
});

describe("renderResult", () => {
  it("adds the LAN hint after a successful add", () => {
    const output = renderResult(
      { ok: true, action: "add", port: 3000, summary: "done", table: { v4tov4: [], v6tov4: [] } },
      ["192.168.1.20"]
    );

    expect(output).toBe(
      [
        "done",
        "IPv4 -> IPv4 (v4tov4)\n  (no entries)\n\nIPv6 -> IPv4 (v6tov4)\n  (no entries)",
        "Reachable from the LAN at:\n  http://192.168.1.20:3000",
      ].join("\n\n")
    );
  });

  it("reports the firewall rule state for show", () => {
    const output = renderResult(
      { ok: true, action: "show", port: 8080, summary: "Forwarding tables for port 8080", firewallRulePresent: false },
      ["192.168.1.20"]
    );

    expect(output).toBe("Forwarding tables for port 8080\n\nFirewall rule for port 8080: absent");
  });
});
