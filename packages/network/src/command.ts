/**
 * External command execution
 *
 * Every host and guest query goes through a CommandRunner so the stores
 * can be exercised without spawning processes.
 */

import { Result } from "better-result";
import { execa } from "execa";
import { CommandError } from "@portbridge/errors";
import { silentLogger, type Logger } from "@portbridge/logger";

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  /**
   * Run a binary to completion. A non-zero exit or a spawn failure is a CommandError.
   */
  run(file: string, args: string[]): Promise<Result<CommandOutput, CommandError>>;
}

/**
 * CommandRunner backed by execa
 */
export class ExecaCommandRunner implements CommandRunner {
  constructor(private logger: Logger = silentLogger) {}

  async run(file: string, args: string[]): Promise<Result<CommandOutput, CommandError>> {
    const result = await execa(file, args, { reject: false, windowsHide: true });
    // Spawn failures (missing binary) have no exit code
    const exitCode = result.exitCode ?? -1;

    this.logger.debug("Command finished", { file, args, exitCode });

    if (result.failed) {
      return Result.err(
        new CommandError({
          message: `Command failed: ${result.command} (exit code ${exitCode})`,
          file,
          args,
          exitCode,
          stdout: result.stdout,
          stderr: result.stderr,
        })
      );
    }

    return Result.ok({ stdout: result.stdout, stderr: result.stderr, exitCode });
  }
}

/**
 * Combined stdout and stderr of a failed command, for message matching
 */
export function combinedOutput(error: CommandError): string {
  return `${error.stdout}\n${error.stderr}`;
}
