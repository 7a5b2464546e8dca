import type { CommandRunner } from "./command.js";

export interface PrivilegeCheck {
  isElevated(): Promise<boolean>;
}

/**
 * `net session` only succeeds in an elevated shell
 */
export class NetSessionPrivilegeCheck implements PrivilegeCheck {
  constructor(
    private runner: CommandRunner,
    private netBinary: string = "net.exe"
  ) {}

  async isElevated(): Promise<boolean> {
    const result = await this.runner.run(this.netBinary, ["session"]);
    return result.isOk();
  }
}
