/**
 * Host forwarding table store
 *
 * Backed by `netsh interface portproxy`. Entries are keyed by
 * (family, listen address, listen port).
 */

import { Result } from "better-result";
import { ForwardingError } from "@portbridge/errors";
import { combinedOutput, type CommandRunner } from "./command.js";
import type {
  DeleteOutcome,
  ForwardingEntry,
  ForwardingFamily,
  ListenKey,
} from "./types.js";

export interface ForwardingStore {
  /** Delete one entry. A missing entry is "absent", not an error. */
  delete(key: ListenKey): Promise<Result<DeleteOutcome, ForwardingError>>;
  add(entry: ForwardingEntry): Promise<Result<void, ForwardingError>>;
  list(family: ForwardingFamily): Promise<Result<ForwardingEntry[], ForwardingError>>;
}

// netsh reports a missing portproxy entry as a missing file
const ENTRY_NOT_FOUND = "cannot find the file specified";

// Data rows look like: 0.0.0.0         3000        172.20.10.5     3000
const TABLE_ROW = /^(\S+)\s+(\d+)\s+(\S+)\s+(\d+)$/;

/**
 * Parse `netsh interface portproxy show <family>` output.
 * Header and separator lines are skipped.
 */
export function parsePortProxyTable(family: ForwardingFamily, output: string): ForwardingEntry[] {
  const entries: ForwardingEntry[] = [];

  for (const line of output.split(/\r?\n/)) {
    const match = line.trim().match(TABLE_ROW);
    if (match) {
      const [, listenAddress, listenPort, connectAddress, connectPort] = match;
      entries.push({
        family,
        listenAddress,
        listenPort: parseInt(listenPort, 10),
        connectAddress,
        connectPort: parseInt(connectPort, 10),
      });
    }
  }

  return entries;
}

export interface NetshForwardingStoreConfig {
  /**
   * netsh binary path (defaults to "netsh.exe")
   */
  netshBinary?: string;
}

export class NetshForwardingStore implements ForwardingStore {
  private netshBinary: string;

  constructor(
    private runner: CommandRunner,
    config: NetshForwardingStoreConfig = {}
  ) {
    this.netshBinary = config.netshBinary ?? "netsh.exe";
  }

  async delete(key: ListenKey): Promise<Result<DeleteOutcome, ForwardingError>> {
    const result = await this.runner.run(this.netshBinary, [
      "interface",
      "portproxy",
      "delete",
      key.family,
      `listenport=${key.listenPort}`,
      `listenaddress=${key.listenAddress}`,
    ]);

    if (result.isOk()) {
      return Result.ok("deleted");
    }

    if (combinedOutput(result.error).toLowerCase().includes(ENTRY_NOT_FOUND)) {
      return Result.ok("absent");
    }

    return Result.err(
      new ForwardingError({
        message: `Failed to delete ${key.family} entry ${key.listenAddress}:${key.listenPort}`,
        operation: "delete",
        family: key.family,
        listenAddress: key.listenAddress,
        port: key.listenPort,
        cause: result.error,
      })
    );
  }

  async add(entry: ForwardingEntry): Promise<Result<void, ForwardingError>> {
    const result = await this.runner.run(this.netshBinary, [
      "interface",
      "portproxy",
      "add",
      entry.family,
      `listenport=${entry.listenPort}`,
      `listenaddress=${entry.listenAddress}`,
      `connectport=${entry.connectPort}`,
      `connectaddress=${entry.connectAddress}`,
    ]);

    if (result.isErr()) {
      return Result.err(
        new ForwardingError({
          message: `Failed to add ${entry.family} entry ${entry.listenAddress}:${entry.listenPort} -> ${entry.connectAddress}:${entry.connectPort}`,
          operation: "add",
          family: entry.family,
          listenAddress: entry.listenAddress,
          port: entry.listenPort,
          cause: result.error,
        })
      );
    }

    return Result.ok(undefined);
  }

  async list(family: ForwardingFamily): Promise<Result<ForwardingEntry[], ForwardingError>> {
    const result = await this.runner.run(this.netshBinary, ["interface", "portproxy", "show", family]);

    if (result.isErr()) {
      return Result.err(
        new ForwardingError({
          message: `Failed to list ${family} entries`,
          operation: "show",
          family,
          listenAddress: "*",
          port: 0,
          cause: result.error,
        })
      );
    }

    return Result.ok(parsePortProxyTable(family, result.unwrap().stdout));
  }
}
