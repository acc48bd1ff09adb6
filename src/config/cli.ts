import {
  Command,
  InvalidArgumentError,
  Option,
  type OutputConfiguration,
} from "commander";
import * as v from "valibot";
import { TRIAGE_MODES, type CliOptions, type TriageMode } from "../types/config.types.js";
import { portSchema, splitMailboxList, thresholdSchema } from "../validation/schemas.js";

export const VERSION = "0.1.0";

interface ProgramOptions {
  server: string;
  port?: number;
  ssl?: boolean;
  user?: string;
  password?: string;
  domain?: string;
  config?: string;
  mode?: TriageMode;
  destination?: string;
  threshold?: number;
  mailbox?: string[];
  allMail?: boolean;
  learn?: boolean;
  verbose: number;
  spamdHost?: string;
  spamdPort?: number;
  spamdSocket?: string;
  spamdUser?: string;
}

function parseWith(schema: v.GenericSchema<unknown, number>) {
  return (value: string): number => {
    const result = v.safeParse(schema, value);
    if (!result.success) {
      throw new InvalidArgumentError(result.issues[0].message);
    }
    return result.output;
  };
}

const parsePort = parseWith(portSchema);
const parseThreshold = parseWith(thresholdSchema);

function parseMode(value: string): TriageMode {
  const mode = TRIAGE_MODES.find(candidate => candidate === value.toLowerCase());
  if (!mode) {
    throw new InvalidArgumentError(`Allowed choices are ${TRIAGE_MODES.join(", ")}.`);
  }
  return mode;
}

function collectMailboxes(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), ...splitMailboxList(value)];
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command()
    .name("imap-checker")
    .description(
      "Scores unread IMAP messages with spamd and moves or deletes the spam",
    )
    .version(VERSION)
    .requiredOption("-s, --server <server>", "IMAP server hostname")
    .option("-p, --port <port>", "IMAP server port (default: 993 with SSL, 143 without)", parsePort)
    .option("--ssl", "connect with TLS")
    .option("--no-ssl", "connect without TLS")
    .option("-u, --user <user>", "IMAP login name")
    .option("-w, --password <password>", "IMAP password")
    .option("--domain <domain>", "Windows domain, sent as DOMAIN\\user")
    .option("-c, --config <path>", "ini config file (default: platform config dir)")
    .addOption(
      new Option("-m, --mode <mode>", "what to do with spam (default: move)")
        .choices(TRIAGE_MODES)
        .argParser(parseMode),
    )
    .option("-d, --destination <folder>", "mailbox spam is moved to (default: Spam)")
    .option("-t, --threshold <score>", "spam score threshold (default: 4.5)", parseThreshold)
    .option(
      "-b, --mailbox <name>",
      "additional mailbox to scan after INBOX (repeatable)",
      collectMailboxes,
    )
    .option("--all-mail", "check read messages too")
    .option("-l, --learn", "teach spamd every message in the destination mailbox")
    .option("-v, --verbose", "more output (repeat for debug)", increaseVerbosity, 0)
    .option("--spamd-host <host>", "spamd host (default: localhost)")
    .option("--spamd-port <port>", "spamd port (default: 783)", parsePort)
    .option("--spamd-socket <path>", "spamd Unix socket, instead of host and port")
    .option("--spamd-user <name>", "user name spamd should score for")
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }

  return program;
}

/**
 * Parse user arguments (without node and script path).
 * Throws CommanderError for --help, --version and usage errors.
 */
export function parseCliArgs(
  argv: readonly string[],
  program: Command = createProgram(),
): CliOptions {
  program.parse([...argv], { from: "user" });
  const options = program.opts<ProgramOptions>();

  return {
    server: options.server,
    port: options.port,
    ssl: options.ssl,
    user: options.user,
    password: options.password,
    domain: options.domain,
    config: options.config,
    mode: options.mode,
    destination: options.destination,
    threshold: options.threshold,
    mailboxes: options.mailbox,
    allMail: options.allMail,
    learn: options.learn,
    verbose: options.verbose,
    spamdHost: options.spamdHost,
    spamdPort: options.spamdPort,
    spamdSocket: options.spamdSocket,
    spamdUser: options.spamdUser,
  };
}
