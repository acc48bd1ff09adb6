#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { CommanderError, type OutputConfiguration } from "commander";

import { createProgram, parseCliArgs } from "./config/cli.js";
import { loadIniSection, resolveConfig } from "./config/config.js";
import { ImapMailSession, withMailSession } from "./services/ImapMailSession.js";
import { LearnService } from "./services/LearnService.js";
import { createLogger, levelForVerbosity, logger } from "./services/Logger.js";
import { SpamdClient } from "./services/SpamdClient.js";
import { TriageService } from "./services/TriageService.js";
import type {
  CliOptions,
  ImapConnection,
  IniSection,
  SpamdConnection,
  TriageConfig,
} from "./types/config.types.js";
import { isFatalError, toCheckerError } from "./types/errors.js";
import type {
  LearnReport,
  MailSession,
  SpamScorer,
  TriageReport,
} from "./types/triage.types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CheckerDependencies {
  loadSection: (host: string, path?: string) => Promise<IniSection | undefined>;
  createSession: (connection: ImapConnection) => MailSession;
  createScorer: (connection: SpamdConnection) => SpamScorer;
}

export const defaultDependencies: CheckerDependencies = {
  loadSection: loadIniSection,
  createSession: connection => new ImapMailSession(connection),
  createScorer: connection => new SpamdClient(connection),
};

export type RunReport =
  | { kind: "triage"; report: TriageReport }
  | { kind: "learn"; report: LearnReport };

class ImapChecker {
  private logger = createLogger("ImapChecker");

  private constructor(
    private config: Readonly<TriageConfig>,
    private deps: CheckerDependencies,
  ) {}

  /**
   * Resolve the configuration before any connection is opened
   */
  static async create(
    cli: CliOptions,
    deps: CheckerDependencies,
  ): Promise<ImapChecker> {
    const section = await deps.loadSection(cli.server, cli.config);
    return new ImapChecker(resolveConfig(cli, section), deps);
  }

  async start(): Promise<RunReport> {
    const session = this.deps.createSession(this.config.imap);
    const scorer = this.deps.createScorer(this.config.spamd);

    return withMailSession<RunReport>(session, async connected => {
      if (this.config.learn) {
        const report = await new LearnService(connected, scorer).run(
          this.config.destination,
        );
        return { kind: "learn", report };
      }

      const report = await new TriageService(connected, scorer, this.config).run();
      this.logger.info(
        `Run complete: ${report.acted} acted on, ${report.skipped} skipped`,
        { operation: "start", service: "ImapChecker" },
        {
          mailboxes: report.mailboxes.map(box =>
            box.opened ? box.mailbox : `${box.mailbox} (not opened)`,
          ),
        },
      );
      return { kind: "triage", report };
    });
  }
}

/**
 * Run one check and return the process exit code
 */
export async function run(
  argv: readonly string[],
  deps: CheckerDependencies = defaultDependencies,
  output?: OutputConfiguration,
): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(argv, createProgram(output));
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  logger.setMinLevel(levelForVerbosity(cli.verbose));

  try {
    const checker = await ImapChecker.create(cli, deps);
    await checker.start();
    return EXIT_OK;
  } catch (error) {
    const checkerError = toCheckerError(error, { operation: "run" });
    const message = checkerError.getUserMessage();
    const context = { operation: "run", service: "ImapChecker" };
    const data = { code: checkerError.code, error: checkerError.message };
    // A recoverable error only gets here when it leaves nothing to do
    if (isFatalError(error)) {
      logger.critical(message, context, data);
    } else {
      logger.error(message, context, data);
    }
    return EXIT_FAILURE;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    // npm installs the bin as a symlink
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
      console.error("Fatal error:", error);
      process.exit(EXIT_FAILURE);
    },
  );
}
