/**
 * Guest Address Resolution
 *
 * Looks up the guest's current IPv4 address. The address changes across
 * guest restarts, so it is never cached.
 *
 * Lookup order:
 * 1. Interface listing (`hostname -I`): first dotted-quad token
 * 2. Interface detail (`ip -4 addr show eth0`): first `address/prefixlen` token
 */

import { Result } from "better-result";
import { ResolutionError } from "@portbridge/errors";
import { silentLogger, type Logger } from "@portbridge/logger";
import type { GuestQuery } from "./guest.js";
import { findIPv4CidrToken, findIPv4Token } from "./ipv4.js";

export const DEFAULT_GUEST_INTERFACE = "eth0";

export interface AddressResolverConfig {
  guestQuery: GuestQuery;
  /** Interface inspected by the fallback lookup (default: "eth0") */
  interfaceName?: string;
  logger?: Logger;
}

export class AddressResolver {
  private readonly guestQuery: GuestQuery;
  private readonly interfaceName: string;
  private readonly logger: Logger;

  constructor(config: AddressResolverConfig) {
    this.guestQuery = config.guestQuery;
    this.interfaceName = config.interfaceName ?? DEFAULT_GUEST_INTERFACE;
    this.logger = (config.logger ?? silentLogger).child({ component: "resolver" });
  }

  async resolve(guest: string): Promise<Result<string, ResolutionError>> {
    const primary = await this.guestQuery.listAddresses(guest);
    if (primary.isOk()) {
      const address = findIPv4Token(primary.unwrap());
      if (address) {
        this.logger.debug("Resolved guest address from interface listing", { guest, address });
        return Result.ok(address);
      }
      this.logger.debug("Interface listing had no IPv4 token", { guest });
    } else {
      this.logger.debug("Interface listing failed", { guest, error: primary.error.message });
    }

    const fallback = await this.guestQuery.describeInterface(guest, this.interfaceName);
    if (fallback.isOk()) {
      const address = findIPv4CidrToken(fallback.unwrap());
      if (address) {
        this.logger.debug("Resolved guest address from interface detail", {
          guest,
          interfaceName: this.interfaceName,
          address,
        });
        return Result.ok(address);
      }
    } else {
      this.logger.debug("Interface detail failed", { guest, error: fallback.error.message });
    }

    return Result.err(new ResolutionError({ message: "no address found", guest }));
  }
}
