/**
 * logrelay command-line program
 *
 * Built by a factory so tests can drive it with captured output.
 */

import { Command } from "commander";
import { resolve } from "path";
import { initConfig, resolveRelayConfig } from "./config.js";
import { runDemo } from "./demo.js";
import { createLogMessage, parseSeverity } from "./log-message.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { SEVERITIES, type DiagnosticStream, type RelayConfig } from "./types.js";
import { VERSION } from "./version.js";
import { createDefaultChain } from "./wiring.js";

export interface ProgramDeps {
  logger: Logger;
  diagnostics: DiagnosticStream;
  cwd: string;
  exit: (code: number) => void;
}

interface GlobalOptions {
  errorFile?: string;
  catchAll: boolean;
}

export function createProgram(overrides: Partial<ProgramDeps> = {}): Command {
  const deps: ProgramDeps = {
    logger: new ConsoleLogger(),
    diagnostics: process.stderr,
    cwd: process.cwd(),
    exit: (code) => process.exit(code),
    ...overrides,
  };
  const { logger } = deps;

  const program = new Command();

  program
    .name("logrelay")
    .description("Route log messages to a handler by severity")
    .version(VERSION)
    .option("--error-file <path>", "File that keeps the latest error message")
    .option("--no-catch-all", "Drop unclassified messages instead of failing on them");

  /**
   * Resolves config from flags and .logrelay/config.json; exits on failure
   */
  function relayConfig(): RelayConfig | null {
    const opts = program.opts<GlobalOptions>();
    try {
      return resolveRelayConfig(
        {
          errorFile: opts.errorFile,
          // commander defaults a --no-* flag to true; only an explicit flag overrides the file
          catchAll: opts.catchAll ? undefined : false,
        },
        deps.cwd
      );
    } catch (err) {
      logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      deps.exit(1);
      return null;
    }
  }

  program
    .command("init")
    .description("Create .logrelay/config.json in the current directory")
    .requiredOption("-e, --error-log <path>", "Error log path to store in the config")
    .action((options: { errorLog: string }) => {
      try {
        const configPath = initConfig(options.errorLog, deps.cwd);
        logger.log(`Created ${configPath}`);
        logger.log(`  Error log: ${resolve(deps.cwd, options.errorLog)}`);
      } catch (err) {
        logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        deps.exit(1);
      }
    });

  program
    .command("dispatch")
    .description(`Send one message through the chain (severity: ${SEVERITIES.join(", ")})`)
    .argument("<severity>", "Message severity")
    .argument("<text...>", "Message text")
    .action((severityInput: string, words: string[]) => {
      const severity = parseSeverity(severityInput);
      if (!severity) {
        logger.error(`Error: Unknown severity "${severityInput}"`);
        logger.error(`Expected one of: ${SEVERITIES.join(", ")}`);
        deps.exit(1);
        return;
      }

      const config = relayConfig();
      if (!config) return;

      const chain = createDefaultChain({ ...config, diagnostics: deps.diagnostics, logger });
      const result = chain.dispatch(createLogMessage(severity, words.join(" ")));

      switch (result.status) {
        case "handled":
          logger.log(`Handled by ${result.handler}`);
          break;
        case "dropped":
          logger.log("Dropped: no handler in the chain claims this severity");
          break;
        case "failed":
          logger.error(result.failure.message);
          deps.exit(1);
          break;
      }
    });

  program
    .command("demo")
    .description("Send one message of each severity and show what happened")
    .action(() => {
      const config = relayConfig();
      if (!config) return;

      const chain = createDefaultChain({ ...config, diagnostics: deps.diagnostics, logger });
      runDemo(chain, config.errorLogPath, logger);
    });

  return program;
}
