/**
 * Error taxonomy for imap-checker.
 * Every error carries a code and tells the run whether it must stop.
 */

export enum ErrorCode {
  // Connection errors
  CONNECTION_FAILED = "CONNECTION_FAILED",
  CONNECTION_TIMEOUT = "CONNECTION_TIMEOUT",
  CONNECTION_REFUSED = "CONNECTION_REFUSED",
  CONNECTION_LOST = "CONNECTION_LOST",
  CONNECTION_TLS = "CONNECTION_TLS",
  HOST_NOT_FOUND = "HOST_NOT_FOUND",

  // Authentication errors
  AUTH_FAILED = "AUTH_FAILED",

  // Mailbox and message errors
  MAILBOX_UNAVAILABLE = "MAILBOX_UNAVAILABLE",
  MESSAGE_NOT_FOUND = "MESSAGE_NOT_FOUND",
  FETCH_FAILED = "FETCH_FAILED",
  ACTION_FAILED = "ACTION_FAILED",
  DESTINATION_UNAVAILABLE = "DESTINATION_UNAVAILABLE",

  // Scorer errors
  SCORER_UNAVAILABLE = "SCORER_UNAVAILABLE",
  SCORER_PROTOCOL = "SCORER_PROTOCOL",

  // Configuration errors
  CONFIG_INVALID = "CONFIG_INVALID",
  CONFIG_MISSING = "CONFIG_MISSING",

  // Internal errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export interface ErrorContext {
  operation?: string;
  mailbox?: string;
  uid?: number;
  timestamp?: Date;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error the checker raises on purpose
 */
export abstract class CheckerError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isFatal: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isFatal = false,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...context,
      timestamp: context.timestamp || new Date(),
    };
    this.isFatal = isFatal;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  getUserMessage(): string {
    return this.message;
  }
}

/**
 * Network, DNS or TLS failure talking to the IMAP server
 */
export class ConnectionError extends CheckerError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONNECTION_FAILED,
    context: ErrorContext = {},
  ) {
    super(message, code, context, true);
  }

  getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.CONNECTION_TIMEOUT:
        return "Connection to the IMAP server timed out. Check your network or the server name.";
      case ErrorCode.CONNECTION_REFUSED:
        return "The IMAP server refused the connection. Check the server name and port.";
      case ErrorCode.HOST_NOT_FOUND:
        return "The IMAP server name could not be resolved.";
      case ErrorCode.CONNECTION_TLS:
        return "TLS negotiation with the IMAP server failed. Check the --ssl setting and port.";
      case ErrorCode.CONNECTION_LOST:
        return "The connection to the IMAP server was lost during the run.";
      default:
        return "Connection failed: check your network or the IMAP server name.";
    }
  }
}

/**
 * Credentials rejected by the IMAP server
 */
export class AuthError extends CheckerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.AUTH_FAILED, context, true);
  }

  getUserMessage(): string {
    return "Login failed. Check your username/password.";
  }
}

/**
 * A mailbox could not be selected; the run skips it
 */
export class MailboxError extends CheckerError {
  public readonly mailbox: string;

  constructor(message: string, mailbox: string, context: ErrorContext = {}) {
    super(message, ErrorCode.MAILBOX_UNAVAILABLE, { ...context, mailbox });
    this.mailbox = mailbox;
  }

  getUserMessage(): string {
    return `Cannot select mailbox ${this.mailbox}.`;
  }
}

export class FetchError extends CheckerError {
  public readonly mailbox: string;
  public readonly uid: number;

  constructor(
    message: string,
    mailbox: string,
    uid: number,
    code: ErrorCode = ErrorCode.FETCH_FAILED,
    context: ErrorContext = {},
  ) {
    super(message, code, { ...context, mailbox, uid });
    this.mailbox = mailbox;
    this.uid = uid;
  }

  getUserMessage(): string {
    if (this.code === ErrorCode.MESSAGE_NOT_FOUND) {
      return `Message ${this.uid} is no longer in ${this.mailbox}.`;
    }
    return `Could not fetch message ${this.uid} from ${this.mailbox}.`;
  }
}

/**
 * Move or delete did not go through; the message stays where it was
 */
export class ActionError extends CheckerError {
  public readonly mailbox?: string;
  public readonly uid?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ACTION_FAILED,
    context: ErrorContext = {},
  ) {
    super(message, code, context);
    this.mailbox = context.mailbox;
    this.uid = context.uid;
  }

  getUserMessage(): string {
    if (this.code === ErrorCode.DESTINATION_UNAVAILABLE) {
      return "The destination mailbox does not exist and could not be created.";
    }
    if (this.uid !== undefined && this.mailbox) {
      return `Could not act on message ${this.uid} in ${this.mailbox}; it was left in place.`;
    }
    return "Could not act on the message; it was left in place.";
  }
}

/**
 * spamd could not be reached. Nothing can be triaged safely after this.
 */
export class ScorerUnavailableError extends CheckerError {
  public readonly endpoint: string;

  constructor(message: string, endpoint: string, context: ErrorContext = {}) {
    super(message, ErrorCode.SCORER_UNAVAILABLE, context, true);
    this.endpoint = endpoint;
  }

  getUserMessage(): string {
    return `Cannot reach spamd at ${this.endpoint}. Is the daemon running?`;
  }
}

export class ScorerProtocolError extends CheckerError {
  public readonly response?: string;

  constructor(message: string, response?: string, context: ErrorContext = {}) {
    super(message, ErrorCode.SCORER_PROTOCOL, context);
    this.response = response;
  }

  getUserMessage(): string {
    return `Unexpected answer from spamd: ${this.message}`;
  }
}

export class ConfigurationError extends CheckerError {
  public readonly configKey?: string;

  constructor(
    message: string,
    configKey?: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context: ErrorContext = {},
  ) {
    super(message, code, context, true);
    this.configKey = configKey;
  }

  getUserMessage(): string {
    if (this.configKey) {
      return `Configuration error for '${this.configKey}': ${this.message}`;
    }
    return `Configuration error: ${this.message}`;
  }
}

class InternalError extends CheckerError {
  constructor(message: string, context: ErrorContext, stack?: string) {
    super(message, ErrorCode.INTERNAL_ERROR, context, true);
    if (stack) {
      this.stack = stack;
    }
  }

  getUserMessage(): string {
    return `Unexpected error: ${this.message}`;
  }
}

/**
 * Errors that are not ours are treated as fatal
 */
export function isFatalError(error: unknown): boolean {
  if (error instanceof CheckerError) {
    return error.isFatal;
  }
  return true;
}

export function getUserMessage(error: unknown): string {
  if (error instanceof CheckerError) {
    return error.getUserMessage();
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}

/**
 * Convert anything thrown into a CheckerError
 */
export function toCheckerError(
  error: unknown,
  context: ErrorContext = {},
): CheckerError {
  if (error instanceof CheckerError) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, context, error.stack);
  }
  return new InternalError(String(error), context);
}
