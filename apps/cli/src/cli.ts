import { exitCodeFor } from "@portbridge/errors";
import { createLogger, generateCorrelationId, type Logger } from "@portbridge/logger";
import {
  AddressResolver,
  ExecaCommandRunner,
  FirewallRuleSynchronizer,
  ForwardingRuleManager,
  NetSessionPrivilegeCheck,
  NetshFirewallStore,
  NetshForwardingStore,
  WslGuestQuery,
  type CommandRunner,
} from "@portbridge/network";
import { parseCliArgs, USAGE } from "./args.js";
import { loadConfig } from "./config.js";
import { hostAddresses, renderResult } from "./render.js";
import { Reconciler } from "./services/reconciler.js";

export interface CliIO {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Host IPv4 addresses for the LAN hint */
  hostAddresses: () => string[];
  /** Builds the runner for external commands; defaults to execa */
  createRunner?: (logger: Logger) => CommandRunner;
}

const defaultIO: CliIO = {
  env: process.env,
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  hostAddresses: () => hostAddresses(),
};

/**
 * Parse arguments, run one action, print the outcome. Resolves to the exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const config = loadConfig(io.env);
  if (config.isErr()) {
    io.stderr(config.error.message);
    return exitCodeFor(config.error);
  }

  const args = parseCliArgs(argv, config.unwrap());
  if (args.isErr()) {
    io.stderr(`${args.error.message}\n\n${USAGE}`);
    return exitCodeFor(args.error);
  }

  const parsed = args.unwrap();
  if (parsed.kind === "help") {
    io.stdout(USAGE);
    return 0;
  }

  const { options } = parsed;
  const { interfaceName, rulePrefix, logLevel } = config.unwrap();
  const logger = createLogger(
    { correlationId: generateCorrelationId(), action: options.action, port: options.port },
    { level: options.verbose ? "debug" : logLevel }
  );

  const runner = io.createRunner?.(logger) ?? new ExecaCommandRunner(logger);
  const reconciler = new Reconciler({
    privilege: new NetSessionPrivilegeCheck(runner),
    resolver: new AddressResolver({ guestQuery: new WslGuestQuery(runner), interfaceName, logger }),
    forwarding: new ForwardingRuleManager(new NetshForwardingStore(runner), logger),
    firewall: new FirewallRuleSynchronizer({ store: new NetshFirewallStore(runner), rulePrefix, logger }),
    logger,
  });

  const result = await reconciler.run(options);
  const output = renderResult(result, result.ok ? io.hostAddresses() : []);

  if (result.error) {
    io.stderr(output);
    return exitCodeFor(result.error);
  }

  io.stdout(output);
  return 0;
}
