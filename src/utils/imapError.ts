import {
  AuthError,
  ConnectionError,
  ErrorCode,
  type ErrorContext,
} from "../types/errors.js";
import type { ImapConnection } from "../types/config.types.js";

const NETWORK_ERROR_CODES = [
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "NoConnection",
  "EConnectionClosed",
];

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

function isAuthenticationFailure(error: Error): boolean {
  return "authenticationFailed" in error && error.authenticationFailed === true;
}

/**
 * True when the error means the IMAP connection itself is gone, as
 * opposed to a single command being rejected by the server.
 */
export function isConnectionLevelError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const code = errorCode(error);
  if (code && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }

  return /connection not available|not connected|socket|connection closed|broken pipe/i.test(
    error.message,
  );
}

/**
 * Classify an error raised while connecting and logging in.
 * Inspects the properties imapflow and Node.js set on the error.
 */
export function classifyImapError(
  error: unknown,
  connection: ImapConnection,
  context: ErrorContext = {},
): AuthError | ConnectionError {
  if (!(error instanceof Error)) {
    return new ConnectionError(
      `IMAP error: ${String(error)}`,
      ErrorCode.CONNECTION_FAILED,
      context,
    );
  }

  if (isAuthenticationFailure(error)) {
    return new AuthError(
      `IMAP authentication failed for ${connection.user}: ${error.message}`,
      context,
    );
  }

  const code = errorCode(error);
  const endpoint = `${connection.host}:${connection.port}`;

  if (code === "ECONNREFUSED") {
    return new ConnectionError(
      `Connection refused by ${endpoint}`,
      ErrorCode.CONNECTION_REFUSED,
      context,
    );
  }

  if (code === "ENOTFOUND" || code === "EAI_AGAIN") {
    return new ConnectionError(
      `Cannot resolve IMAP server hostname '${connection.host}'`,
      ErrorCode.HOST_NOT_FOUND,
      context,
    );
  }

  if (code === "ETIMEDOUT" || code === "CONNECT_TIMEOUT") {
    return new ConnectionError(
      `Connection to ${endpoint} timed out`,
      ErrorCode.CONNECTION_TIMEOUT,
      context,
    );
  }

  if (code?.startsWith("ERR_TLS") || /tls|ssl|certificate/i.test(error.message)) {
    return new ConnectionError(
      `TLS error connecting to ${endpoint}: ${error.message}`,
      ErrorCode.CONNECTION_TLS,
      context,
    );
  }

  if (isConnectionLevelError(error)) {
    return new ConnectionError(
      `Connection to ${endpoint} lost: ${error.message}`,
      ErrorCode.CONNECTION_LOST,
      context,
    );
  }

  return new ConnectionError(
    `IMAP error: ${error.message}`,
    ErrorCode.CONNECTION_FAILED,
    context,
  );
}
