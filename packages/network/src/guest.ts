import { Result } from "better-result";
import type { CommandError } from "@portbridge/errors";
import type { CommandRunner } from "./command.js";

/**
 * Queries run inside the guest. Both return raw command output.
 */
export interface GuestQuery {
  /** Interface listing, one line of space-separated addresses */
  listAddresses(guest: string): Promise<Result<string, CommandError>>;
  /** Detail of one interface, containing `address/prefixlen` tokens */
  describeInterface(guest: string, interfaceName: string): Promise<Result<string, CommandError>>;
}

export interface WslGuestQueryConfig {
  /**
   * WSL launcher binary (defaults to "wsl.exe")
   */
  wslBinary?: string;
}

/**
 * GuestQuery for a WSL distribution, run through `wsl.exe -d <distro> --`
 */
export class WslGuestQuery implements GuestQuery {
  private wslBinary: string;

  constructor(
    private runner: CommandRunner,
    config: WslGuestQueryConfig = {}
  ) {
    this.wslBinary = config.wslBinary ?? "wsl.exe";
  }

  private async exec(guest: string, cmd: string[]): Promise<Result<string, CommandError>> {
    const result = await this.runner.run(this.wslBinary, ["-d", guest, "--", ...cmd]);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    return Result.ok(result.unwrap().stdout);
  }

  listAddresses(guest: string): Promise<Result<string, CommandError>> {
    return this.exec(guest, ["hostname", "-I"]);
  }

  describeInterface(guest: string, interfaceName: string): Promise<Result<string, CommandError>> {
    return this.exec(guest, ["ip", "-4", "addr", "show", interfaceName]);
  }
}
