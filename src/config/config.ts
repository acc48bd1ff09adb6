import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import ini from "ini";
import type {
  CliOptions,
  IniSection,
  TriageConfig,
} from "../types/config.types.js";
import { ConfigurationError, ErrorCode } from "../types/errors.js";
import {
  iniSectionSchema,
  triageConfigSchema,
  validateConfig,
} from "../validation/schemas.js";
import { createLogger } from "../services/Logger.js";

const logger = createLogger("config");

export const DEFAULTS = {
  mode: "move",
  destination: "Spam",
  threshold: 4.5,
  imapPort: 143,
  imapsPort: 993,
  spamdHost: "localhost",
  spamdPort: 783,
} as const;

const CONFIG_DIR = "imap-checker";
const CONFIG_FILE = "config";

type IniValues = Record<string, unknown>;

function isRecord(value: unknown): value is IniValues {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Platform configuration directory joined with imap-checker/config
 */
export function defaultConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string {
  let base: string;
  if (platform === "win32") {
    base = env.APPDATA || join(home, "AppData", "Roaming");
  } else if (platform === "darwin") {
    base = join(home, "Library", "Application Support");
  } else {
    base = env.XDG_CONFIG_HOME || join(home, ".config");
  }
  return join(base, CONFIG_DIR, CONFIG_FILE);
}

/**
 * The ini parser nests dotted section names, so `[mail.example.com]` ends up
 * under mail → example → com. Try the literal key first, then walk the parts.
 */
export function findIniSection(parsed: IniValues, host: string): IniValues | undefined {
  const direct = parsed[host];
  if (isRecord(direct)) {
    return direct;
  }

  let node: unknown = parsed;
  for (const part of host.split(".")) {
    if (!isRecord(node)) {
      return undefined;
    }
    node = node[part];
  }
  return isRecord(node) ? node : undefined;
}

/**
 * Only the section's own keys: nested objects belong to longer hostnames
 */
function ownValues(section: IniValues): IniValues {
  const values: IniValues = {};
  for (const [key, value] of Object.entries(section)) {
    if (!isRecord(value)) {
      values[key] = value;
    }
  }
  return values;
}

export function parseIniConfig(text: string, host: string): IniSection | undefined {
  const parsed: unknown = ini.parse(text);
  if (!isRecord(parsed)) {
    return undefined;
  }

  const section = findIniSection(parsed, host);
  if (!section) {
    return undefined;
  }

  const values = ownValues(section);
  if (Object.keys(values).length === 0) {
    return undefined;
  }

  return validateConfig(iniSectionSchema, values, `Config section [${host}]`);
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Read the section for `host`. A missing default file means "no file";
 * a missing file the user named is an error.
 */
export async function loadIniSection(
  host: string,
  explicitPath?: string,
): Promise<IniSection | undefined> {
  const path = explicitPath ?? defaultConfigPath();

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (explicitPath === undefined && isMissingFile(error)) {
      logger.debug(`No config file at ${path}`, { operation: "loadIniSection" });
      return undefined;
    }
    throw new ConfigurationError(
      `Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      "config",
      ErrorCode.CONFIG_MISSING,
      { operation: "loadIniSection" },
    );
  }

  const section = parseIniConfig(text, host);
  if (section) {
    logger.debug(`Using section [${host}] from ${path}`, { operation: "loadIniSection" });
  } else {
    logger.debug(`No section [${host}] in ${path}`, { operation: "loadIniSection" });
  }
  return section;
}

/**
 * Explicit CLI value > ini value > default. Pure; validates the result.
 */
export function resolveConfig(
  cli: CliOptions,
  section?: IniSection,
): Readonly<TriageConfig> {
  const secure = cli.ssl ?? section?.ssl ?? false;
  const domain = cli.domain ?? section?.domain;
  const socketPath = cli.spamdSocket ?? section?.spamdSocket;
  const spamdUser = cli.spamdUser ?? section?.spamdUser;

  const merged = validateConfig(triageConfigSchema, {
    imap: {
      host: cli.server,
      port: cli.port ?? section?.port ?? (secure ? DEFAULTS.imapsPort : DEFAULTS.imapPort),
      secure,
      user: cli.user ?? section?.user,
      password: cli.password ?? section?.password,
      ...(domain !== undefined && { domain }),
    },
    spamd: {
      host: cli.spamdHost ?? section?.spamdHost ?? DEFAULTS.spamdHost,
      port: cli.spamdPort ?? section?.spamdPort ?? DEFAULTS.spamdPort,
      ...(socketPath !== undefined && { socketPath }),
      ...(spamdUser !== undefined && { user: spamdUser }),
    },
    mailboxes: cli.mailboxes ?? section?.boxes ?? [],
    allMail: cli.allMail ?? section?.allMail ?? false,
    mode: cli.mode ?? section?.mode ?? DEFAULTS.mode,
    destination: cli.destination ?? section?.destination ?? DEFAULTS.destination,
    threshold: cli.threshold ?? section?.threshold ?? DEFAULTS.threshold,
    learn: cli.learn ?? false,
    verbosity: cli.verbose,
  });

  return Object.freeze(merged);
}
