import * as v from "valibot";
import { TRIAGE_MODES } from "../types/config.types.js";
import { ConfigurationError } from "../types/errors.js";

// =============================================================================
// VALUE SCHEMAS
// =============================================================================

const TRUE_WORDS = ["true", "yes", "on", "1"];
const BOOLEAN_WORDS = [...TRUE_WORDS, "false", "no", "off", "0"] as const;

/**
 * The ini package turns true/false into booleans; everything else stays a string
 */
const booleanishSchema = v.union([
  v.boolean(),
  v.pipe(
    v.string(),
    v.trim(),
    v.toLowerCase(),
    v.picklist(BOOLEAN_WORDS, "Expected a boolean (true/false, yes/no, on/off, 1/0)"),
    v.transform(value => TRUE_WORDS.includes(value)),
  ),
]);

const numericInputSchema = v.union([
  v.pipe(v.string(), v.trim(), v.nonEmpty("Value cannot be empty")),
  v.number(),
]);

export const portSchema = v.pipe(
  numericInputSchema,
  v.transform(Number),
  v.number("Port must be a number"),
  v.integer("Port must be an integer"),
  v.minValue(1, "Port must be between 1 and 65535"),
  v.maxValue(65535, "Port must be between 1 and 65535"),
);

export const thresholdSchema = v.pipe(
  numericInputSchema,
  v.transform(Number),
  v.number("Threshold must be a number"),
  v.finite("Threshold must be finite"),
);

const nonEmptyString = v.pipe(v.string(), v.trim(), v.nonEmpty());

/**
 * Mailbox names separated by commas or semicolons
 */
export function splitMailboxList(value: string): string[] {
  return value
    .split(/[,;]/)
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

const mailboxListSchema = v.union([
  v.pipe(v.string(), v.transform(splitMailboxList)),
  v.pipe(
    v.array(v.string()),
    v.transform(names => names.flatMap(splitMailboxList)),
  ),
]);

const modeSchema = v.pipe(
  v.string(),
  v.trim(),
  v.toLowerCase(),
  v.picklist(TRIAGE_MODES, "Mode must be 'move' or 'delete'"),
);

// =============================================================================
// CONFIG FILE
// =============================================================================

/**
 * One `[hostname]` section. `treshold` is spelled the way existing config
 * files spell it.
 */
export const iniSectionSchema = v.pipe(
  v.object({
    user: v.pipe(v.string("user is required"), v.trim(), v.nonEmpty("user is required")),
    password: v.pipe(v.string("password is required"), v.nonEmpty("password is required")),
    domain: v.optional(nonEmptyString),
    port: v.optional(portSchema),
    ssl: v.optional(booleanishSchema),
    boxes: v.optional(mailboxListSchema),
    "all-mail": v.optional(booleanishSchema),
    treshold: v.optional(thresholdSchema),
    mode: v.optional(modeSchema),
    destination: v.optional(nonEmptyString),
    "spamd-host": v.optional(nonEmptyString),
    "spamd-port": v.optional(portSchema),
    "spamd-socket": v.optional(nonEmptyString),
    "spamd-user": v.optional(nonEmptyString),
  }),
  v.transform(section => ({
    user: section.user,
    password: section.password,
    domain: section.domain,
    port: section.port,
    ssl: section.ssl,
    boxes: section.boxes,
    allMail: section["all-mail"],
    threshold: section.treshold,
    mode: section.mode,
    destination: section.destination,
    spamdHost: section["spamd-host"],
    spamdPort: section["spamd-port"],
    spamdSocket: section["spamd-socket"],
    spamdUser: section["spamd-user"],
  })),
);

// =============================================================================
// RESOLVED CONFIGURATION
// =============================================================================

export const triageConfigSchema = v.object({
  imap: v.object({
    host: v.pipe(v.string(), v.trim(), v.nonEmpty("server is required")),
    port: portSchema,
    secure: v.boolean(),
    user: v.pipe(
      v.string("user is required (-u or 'user' in the config file)"),
      v.nonEmpty("user is required"),
    ),
    password: v.pipe(
      v.string("password is required (-w or 'password' in the config file)"),
      v.nonEmpty("password is required"),
    ),
    domain: v.optional(v.string()),
  }),
  spamd: v.object({
    host: nonEmptyString,
    port: portSchema,
    socketPath: v.optional(nonEmptyString),
    user: v.optional(nonEmptyString),
  }),
  mailboxes: v.array(v.string()),
  allMail: v.boolean(),
  mode: modeSchema,
  destination: v.pipe(v.string(), v.trim(), v.nonEmpty("destination cannot be empty")),
  threshold: thresholdSchema,
  learn: v.boolean(),
  verbosity: v.pipe(v.number(), v.integer(), v.minValue(0)),
});

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

export function formatIssues(issues: [v.BaseIssue<unknown>, ...v.BaseIssue<unknown>[]]): string {
  const flat = v.flatten(issues);
  const messages: string[] = [];

  for (const [path, pathIssues] of Object.entries(flat.nested || {})) {
    if (Array.isArray(pathIssues)) {
      for (const message of pathIssues) {
        messages.push(`${path}: ${message}`);
      }
    }
  }

  for (const message of flat.root || []) {
    messages.push(message);
  }

  return messages.join(", ");
}

/**
 * Parse or throw a ConfigurationError naming every failing key
 */
export function validateConfig<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
  source = "Configuration",
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return result.output;
  }
  throw new ConfigurationError(
    `${source} validation failed: ${formatIssues(result.issues)}`,
  );
}
