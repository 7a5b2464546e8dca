import { Result } from "better-result";
import { CommandError } from "@portbridge/errors";
import type { CommandOutput, CommandRunner } from "../command.js";

export interface RecordedCall {
  file: string;
  args: string[];
}

type Reply = { exitCode: number; stdout?: string; stderr?: string };

/**
 * CommandRunner that records calls and answers from a queue, defaulting to success
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private replies: Reply[] = [];

  reply(reply: Reply): this {
    this.replies.push(reply);
    return this;
  }

  async run(file: string, args: string[]): Promise<Result<CommandOutput, CommandError>> {
    this.calls.push({ file, args });
    const reply = this.replies.shift() ?? { exitCode: 0 };
    const stdout = reply.stdout ?? "";
    const stderr = reply.stderr ?? "";

    if (reply.exitCode !== 0) {
      return Result.err(
        new CommandError({
          message: `Command failed: ${file} ${args.join(" ")} (exit code ${reply.exitCode})`,
          file,
          args,
          exitCode: reply.exitCode,
          stdout,
          stderr,
        })
      );
    }
    return Result.ok({ stdout, stderr, exitCode: 0 });
  }
}
