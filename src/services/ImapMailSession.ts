import { ImapFlow } from "imapflow";
import type { ImapConnection, TriageMode } from "../types/config.types.js";
import {
  ActionError,
  type CheckerError,
  ConnectionError,
  ErrorCode,
  FetchError,
  MailboxError,
} from "../types/errors.js";
import type { MailSession } from "../types/triage.types.js";
import { classifyImapError, isConnectionLevelError } from "../utils/imapError.js";
import { createLogger } from "./Logger.js";

type MailboxLock = Awaited<ReturnType<ImapFlow["getMailboxLock"]>>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The login name sent to the server. Exchange wants DOMAIN\user.
 */
export function loginName(connection: ImapConnection): string {
  return connection.domain
    ? `${connection.domain}\\${connection.user}`
    : connection.user;
}

/**
 * One authenticated IMAP connection for the whole run.
 * Wraps ImapFlow and translates its failures into the checker's error types.
 */
export class ImapMailSession implements MailSession {
  private client: ImapFlow | null = null;
  private logger = createLogger("ImapMailSession");

  constructor(private connection: ImapConnection) {}

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new ImapFlow({
      host: this.connection.host,
      port: this.connection.port,
      secure: this.connection.secure,
      auth: {
        user: loginName(this.connection),
        pass: this.connection.password,
      },
      logger: false,
    });

    // An "error" event without a listener crashes the process
    client.on("error", (error: Error) => {
      this.logger.error(
        "IMAP connection error",
        { operation: "connect", service: "ImapMailSession" },
        { error: error.message },
      );
    });

    try {
      await client.connect();
    } catch (error) {
      throw classifyImapError(error, this.connection, { operation: "connect" });
    }

    this.client = client;
    this.logger.info(
      `Connection to ${this.connection.host} established.`,
      { operation: "connect", service: "ImapMailSession" },
      {
        port: this.connection.port,
        secure: this.connection.secure,
        user: loginName(this.connection),
      },
    );
  }

  async listCandidates(mailbox: string, allMail: boolean): Promise<number[]> {
    const client = this.requireClient();
    const lock = await this.lockMailbox(client, mailbox, error =>
      this.mailboxFailure(error, mailbox),
    );

    try {
      const result = await client.search(
        allMail ? { all: true } : { seen: false },
        { uid: true },
      );
      const uids = Array.isArray(result) ? [...result].sort((a, b) => a - b) : [];

      this.logger.info(`Found ${uids.length} messages in ${mailbox}`, {
        operation: "listCandidates",
        mailbox,
      });
      return uids;
    } catch (error) {
      throw this.mailboxFailure(error, mailbox);
    } finally {
      lock.release();
    }
  }

  async fetch(mailbox: string, uid: number): Promise<Buffer> {
    const client = this.requireClient();
    const lock = await this.lockMailbox(client, mailbox, error =>
      this.fetchFailure(error, mailbox, uid),
    );

    try {
      // `source` is fetched with BODY.PEEK[], so \Seen stays untouched
      const message = await client.fetchOne(
        String(uid),
        { uid: true, source: true },
        { uid: true },
      );

      if (!message || !message.source) {
        throw new FetchError(
          `Message ${uid} no longer exists in ${mailbox}`,
          mailbox,
          uid,
          ErrorCode.MESSAGE_NOT_FOUND,
          { operation: "fetch" },
        );
      }

      return message.source;
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw this.fetchFailure(error, mailbox, uid);
    } finally {
      lock.release();
    }
  }

  async applyAction(
    mailbox: string,
    uid: number,
    mode: TriageMode,
    destination: string,
  ): Promise<void> {
    const client = this.requireClient();
    const lock = await this.lockMailbox(client, mailbox, error =>
      this.actionFailure(error, mailbox, uid, mode),
    );

    try {
      if (mode === "move") {
        const result = await client.messageMove(String(uid), destination, {
          uid: true,
        });
        if (!result) {
          throw new ActionError(
            `Server did not move message ${uid} from ${mailbox} to ${destination}`,
            ErrorCode.ACTION_FAILED,
            { operation: "move", mailbox, uid },
          );
        }
      } else {
        const deleted = await client.messageDelete(String(uid), { uid: true });
        if (!deleted) {
          throw new ActionError(
            `Server did not delete message ${uid} from ${mailbox}`,
            ErrorCode.ACTION_FAILED,
            { operation: "delete", mailbox, uid },
          );
        }
      }
    } catch (error) {
      if (error instanceof ActionError) {
        throw error;
      }
      throw this.actionFailure(error, mailbox, uid, mode);
    } finally {
      lock.release();
    }
  }

  async ensureMailbox(path: string): Promise<"exists" | "created"> {
    const client = this.requireClient();

    try {
      const folders = await client.list();
      if (folders.some(folder => sameMailbox(folder.path, path))) {
        return "exists";
      }

      await client.mailboxCreate(path);
      this.logger.notice(`Created mailbox ${path}`, {
        operation: "ensureMailbox",
        mailbox: path,
      });
      return "created";
    } catch (error) {
      if (isConnectionLevelError(error)) {
        throw this.connectionLost(error, "ensureMailbox");
      }
      throw new ActionError(
        `Mailbox ${path} is missing and could not be created: ${errorMessage(error)}`,
        ErrorCode.DESTINATION_UNAVAILABLE,
        { operation: "ensureMailbox", mailbox: path },
      );
    }
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    const client = this.client;
    this.client = null;

    try {
      await client.logout();
      this.logger.info("Logout done.", { operation: "close" });
    } catch (error) {
      this.logger.warning(
        "Error during IMAP logout",
        { operation: "close", service: "ImapMailSession" },
        { error: errorMessage(error) },
      );
    }
  }

  private requireClient(): ImapFlow {
    if (!this.client) {
      throw new ConnectionError(
        "IMAP session is not connected",
        ErrorCode.CONNECTION_LOST,
      );
    }
    return this.client;
  }

  private async lockMailbox(
    client: ImapFlow,
    mailbox: string,
    onFailure: (error: unknown) => CheckerError,
  ): Promise<MailboxLock> {
    try {
      return await client.getMailboxLock(mailbox);
    } catch (error) {
      throw onFailure(error);
    }
  }

  private connectionLost(error: unknown, operation: string): ConnectionError {
    return new ConnectionError(
      `Connection to ${this.connection.host} lost: ${errorMessage(error)}`,
      ErrorCode.CONNECTION_LOST,
      { operation },
    );
  }

  private mailboxFailure(error: unknown, mailbox: string): CheckerError {
    if (isConnectionLevelError(error)) {
      return this.connectionLost(error, "listCandidates");
    }
    return new MailboxError(
      `Cannot open mailbox ${mailbox}: ${errorMessage(error)}`,
      mailbox,
      { operation: "listCandidates" },
    );
  }

  private fetchFailure(error: unknown, mailbox: string, uid: number): CheckerError {
    if (isConnectionLevelError(error)) {
      return this.connectionLost(error, "fetch");
    }
    return new FetchError(
      `Cannot fetch message ${uid} from ${mailbox}: ${errorMessage(error)}`,
      mailbox,
      uid,
      ErrorCode.FETCH_FAILED,
      { operation: "fetch" },
    );
  }

  private actionFailure(
    error: unknown,
    mailbox: string,
    uid: number,
    mode: TriageMode,
  ): CheckerError {
    if (isConnectionLevelError(error)) {
      return this.connectionLost(error, mode);
    }
    return new ActionError(
      `Cannot ${mode} message ${uid} in ${mailbox}: ${errorMessage(error)}`,
      ErrorCode.ACTION_FAILED,
      { operation: mode, mailbox, uid },
    );
  }
}

/**
 * INBOX is case-insensitive (RFC 3501 §5.1); every other name is compared as is
 */
function sameMailbox(a: string, b: string): boolean {
  if (a.toUpperCase() === "INBOX" && b.toUpperCase() === "INBOX") {
    return true;
  }
  return a === b;
}

/**
 * Connect, run `fn`, and log out on every exit path
 */
export async function withMailSession<T>(
  session: MailSession,
  fn: (session: MailSession) => Promise<T>,
): Promise<T> {
  try {
    await session.connect();
    return await fn(session);
  } finally {
    await session.close();
  }
}
