import { Result } from "better-result";
import { ForwardingError } from "@portbridge/errors";
import { silentLogger, type Logger } from "@portbridge/logger";
import { isIPv4 } from "./ipv4.js";
import type { ForwardingStore } from "./portproxy.js";
import {
  ANY_V4,
  ANY_V6,
  LOOPBACK_V4,
  type DeleteOutcome,
  type ForwardingEntry,
  type ForwardingTable,
  type ListenKey,
} from "./types.js";

/**
 * Keys cleared by remove(), in deletion order
 */
export function listenKeysFor(port: number, includeIPv6: boolean): ListenKey[] {
  const keys: ListenKey[] = [
    { family: "v4tov4", listenAddress: LOOPBACK_V4, listenPort: port },
    { family: "v4tov4", listenAddress: ANY_V4, listenPort: port },
  ];
  if (includeIPv6) {
    keys.push({ family: "v6tov4", listenAddress: ANY_V6, listenPort: port });
  }
  return keys;
}

/**
 * Creates and removes the forwarding entries for one port.
 *
 * add() assumes no conflicting entry exists; callers remove() first.
 */
export class ForwardingRuleManager {
  private readonly logger: Logger;

  constructor(
    private readonly store: ForwardingStore,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: "forwarding" });
  }

  /**
   * Delete every key for the port. Each deletion is attempted even after
   * one fails; the first failure is returned.
   */
  async remove(port: number, includeIPv6: boolean): Promise<Result<void, ForwardingError>> {
    let firstError: ForwardingError | undefined;

    for (const key of listenKeysFor(port, includeIPv6)) {
      const result = await this.deleteKey(key);
      if (result.isErr()) {
        this.logger.error("Failed to delete forwarding entry", { ...key, error: result.error.message });
        firstError ??= result.error;
        continue;
      }
      this.logger.debug("Forwarding entry cleared", { ...key, outcome: result.unwrap() });
    }

    if (firstError) {
      return Result.err(firstError);
    }
    return Result.ok(undefined);
  }

  /**
   * A failed delete counts as "absent" when the table no longer lists the key.
   * The store's own absence detection reads message text, which is localized.
   */
  private async deleteKey(key: ListenKey): Promise<Result<DeleteOutcome, ForwardingError>> {
    const deleted = await this.store.delete(key);
    if (deleted.isOk()) {
      return deleted;
    }

    const listed = await this.store.list(key.family);
    if (listed.isErr()) {
      return Result.err(deleted.error);
    }

    const present = listed
      .unwrap()
      .some((entry) => entry.listenAddress === key.listenAddress && entry.listenPort === key.listenPort);
    if (present) {
      return Result.err(deleted.error);
    }
    this.logger.debug("Delete failed but entry is not listed", { ...key });
    return Result.ok("absent");
  }

  async add(
    port: number,
    targetAddress: string,
    includeIPv6: boolean
  ): Promise<Result<void, ForwardingError>> {
    if (!isIPv4(targetAddress)) {
      return Result.err(
        new ForwardingError({
          message: `Invalid target address: ${targetAddress}`,
          operation: "add",
          family: "v4tov4",
          listenAddress: ANY_V4,
          port,
        })
      );
    }

    const entries: ForwardingEntry[] = [
      { family: "v4tov4", listenAddress: ANY_V4, listenPort: port, connectAddress: targetAddress, connectPort: port },
    ];
    if (includeIPv6) {
      entries.push({
        family: "v6tov4",
        listenAddress: ANY_V6,
        listenPort: port,
        connectAddress: targetAddress,
        connectPort: port,
      });
    }

    for (const entry of entries) {
      const result = await this.store.add(entry);
      if (result.isErr()) {
        this.logger.error("Failed to add forwarding entry", { ...entry, error: result.error.message });
        return Result.err(result.error);
      }
      this.logger.info("Forwarding entry added", { ...entry });
    }
    return Result.ok(undefined);
  }

  /**
   * Current contents of both tables
   */
  async show(): Promise<Result<ForwardingTable, ForwardingError>> {
    const v4 = await this.store.list("v4tov4");
    if (v4.isErr()) {
      return Result.err(v4.error);
    }
    const v6 = await this.store.list("v6tov4");
    if (v6.isErr()) {
      return Result.err(v6.error);
    }
    return Result.ok({ v4tov4: v4.unwrap(), v6tov4: v6.unwrap() });
  }
}
