import { describe, it, expect } from "vitest";
import { ForwardingError } from "@portbridge/errors";
import { ForwardingRuleManager, listenKeysFor } from "../forwarding.js";
import { InMemoryForwardingStore } from "../memory.js";
import { NetshForwardingStore } from "../portproxy.js";
import { FakeCommandRunner } from "./helpers.js";

describe("listenKeysFor", () => {
  it("lists loop-back then any-address for IPv4 only", () => {
    expect(listenKeysFor(3000, false)).toEqual([
      { family: "v4tov4", listenAddress: "127.0.0.1", listenPort: 3000 },
      { family: "v4tov4", listenAddress: "0.0.0.0", listenPort: 3000 },
    ]);
  });

  it("appends the IPv6 any-address when requested", () => {
    expect(listenKeysFor(8080, true)[2]).toEqual({ family: "v6tov4", listenAddress: "::", listenPort: 8080 });
  });
});

describe("ForwardingRuleManager", () => {
  it("removes in order and tolerates absent entries", async () => {
    const store = new InMemoryForwardingStore();
    const manager = new ForwardingRuleManager(store);

    const result = await manager.remove(3000, true);

    expect(result.isOk()).toBe(true);
    expect(store.operations).toEqual([
      { op: "delete", key: { family: "v4tov4", listenAddress: "127.0.0.1", listenPort: 3000 } },
      { op: "delete", key: { family: "v4tov4", listenAddress: "0.0.0.0", listenPort: 3000 } },
      { op: "delete", key: { family: "v6tov4", listenAddress: "::", listenPort: 3000 } },
    ]);
  });

  it("clears an existing loop-back entry", async () => {
    const store = new InMemoryForwardingStore([
      { family: "v4tov4", listenAddress: "127.0.0.1", listenPort: 3000, connectAddress: "172.20.0.2", connectPort: 3000 },
    ]);
    const manager = new ForwardingRuleManager(store);

    await manager.remove(3000, false);

    expect((await store.list("v4tov4")).unwrap()).toEqual([]);
  });

  it("adds only the IPv4 entry without ipv6", async () => {
    const store = new InMemoryForwardingStore();
    const manager = new ForwardingRuleManager(store);

    await manager.add(3000, "172.20.10.5", false);

    const table = (await manager.show()).unwrap();
    expect(table.v4tov4).toEqual([
      { family: "v4tov4", listenAddress: "0.0.0.0", listenPort: 3000, connectAddress: "172.20.10.5", connectPort: 3000 },
    ]);
    expect(table.v6tov4).toEqual([]);
  });

  it("adds the IPv6-to-IPv4 entry with ipv6", async () => {
    const store = new InMemoryForwardingStore();
    const manager = new ForwardingRuleManager(store);

    await manager.add(5173, "172.20.10.5", true);

    const table = (await manager.show()).unwrap();
    expect(table.v6tov4).toEqual([
      { family: "v6tov4", listenAddress: "::", listenPort: 5173, connectAddress: "172.20.10.5", connectPort: 5173 },
    ]);
  });

  it("rejects a target that is not a dotted quad", async () => {
    const store = new InMemoryForwardingStore();
    const manager = new ForwardingRuleManager(store);

    const result = await manager.add(3000, "fe80::1", false);

    expect(result.isErr()).toBe(true);
    expect(store.operations).toEqual([]);
  });

  it("attempts every deletion and reports the first failure", async () => {
    const store = new InMemoryForwardingStore([
      { family: "v4tov4", listenAddress: "127.0.0.1", listenPort: 3000, connectAddress: "172.20.0.2", connectPort: 3000 },
      { family: "v4tov4", listenAddress: "0.0.0.0", listenPort: 3000, connectAddress: "172.20.0.2", connectPort: 3000 },
    ]);
    store.failWhen = (operation) => operation.op === "delete" && operation.key.listenAddress === "127.0.0.1";
    const manager = new ForwardingRuleManager(store);

    const result = await manager.remove(3000, true);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(ForwardingError.is(result.error)).toBe(true);
      expect(result.error.listenAddress).toBe("127.0.0.1");
    }
    expect(store.operations).toHaveLength(3);
    expect((await store.list("v4tov4")).unwrap().map((entry) => entry.listenAddress)).toEqual(["127.0.0.1"]);
  });

  it("treats a failed delete of an unlisted entry as absent", async () => {
    const store = new InMemoryForwardingStore();
    store.failWhen = (operation) => operation.op === "delete";
    const manager = new ForwardingRuleManager(store);

    const result = await manager.remove(3000, true);

    expect(result.isOk()).toBe(true);
    expect(store.operations).toHaveLength(3);
  });

  describe("with localized netsh output", () => {
    const NOT_FOUND_DE = "Das System kann die angegebene Datei nicht finden.\r\n";
    const EMPTY_TABLE_DE = [
      "Abfragen auf ipv4:             Verbinden mit ipv4:",
      "",
      "Adresse         Anschluss   Adresse         Anschluss",
      "--------------- ----------  --------------- ----------",
    ].join("\r\n");

    it("removes idempotently when absent entries are reported in another language", async () => {
      const runner = new FakeCommandRunner()
        .reply({ exitCode: 1, stdout: NOT_FOUND_DE })
        .reply({ exitCode: 0, stdout: EMPTY_TABLE_DE })
        .reply({ exitCode: 1, stdout: NOT_FOUND_DE })
        .reply({ exitCode: 0, stdout: EMPTY_TABLE_DE });
      const manager = new ForwardingRuleManager(new NetshForwardingStore(runner));

      const result = await manager.remove(3000, false);

      expect(result.isOk()).toBe(true);
      expect(runner.calls.map((call) => call.args.slice(0, 4).join(" "))).toEqual([
        "interface portproxy delete v4tov4",
        "interface portproxy show v4tov4",
        "interface portproxy delete v4tov4",
        "interface portproxy show v4tov4",
      ]);
    });

    it("still fails when the entry remains listed", async () => {
      const runner = new FakeCommandRunner()
        .reply({ exitCode: 1, stdout: "Zugriff verweigert.\r\n" })
        .reply({ exitCode: 0, stdout: `${EMPTY_TABLE_DE}\r\n127.0.0.1       3000        172.20.0.2      3000` })
        .reply({ exitCode: 1, stdout: NOT_FOUND_DE })
        .reply({ exitCode: 0, stdout: EMPTY_TABLE_DE });
      const manager = new ForwardingRuleManager(new NetshForwardingStore(runner));

      const result = await manager.remove(3000, false);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe("Failed to delete v4tov4 entry 127.0.0.1:3000");
      }
      expect(runner.calls).toHaveLength(4);
    });
  });

  it("keeps entries created before a failure", async () => {
    const store = new InMemoryForwardingStore();
    store.failWhen = (operation) => operation.op === "add" && operation.entry.family === "v6tov4";
    const manager = new ForwardingRuleManager(store);

    const result = await manager.add(3000, "172.20.10.5", true);

    expect(result.isErr()).toBe(true);
    expect((await store.list("v4tov4")).unwrap()).toHaveLength(1);
  });
});
