import type { TriageConfig, TriageMode } from "../../src/types/config.types.js";
import {
  ActionError,
  ErrorCode,
  FetchError,
  MailboxError,
  ScorerProtocolError,
  ScorerUnavailableError,
} from "../../src/types/errors.js";
import type { MailSession, SpamScorer } from "../../src/types/triage.types.js";

export interface FakeMessage {
  uid: number;
  raw: Buffer;
  seen: boolean;
}

/**
 * A message whose X-Test-Score header tells the fake scorer what to answer
 */
export function fakeMessage(uid: number, score: number | string, seen = false): FakeMessage {
  return {
    uid,
    seen,
    raw: Buffer.from(
      `From: sender${uid}@example.com\r\nSubject: Message ${uid}\r\nX-Test-Score: ${score}\r\n\r\nHello\r\n`,
    ),
  };
}

export interface RecordedAction {
  mailbox: string;
  uid: number;
  mode: TriageMode;
  destination: string;
}

/**
 * In-memory MailSession. Mailboxes are created by `addMailbox`; moved
 * messages land in the destination under a fresh UID.
 */
export class FakeMailSession implements MailSession {
  readonly mailboxes = new Map<string, FakeMessage[]>();
  readonly fetched: Array<{ mailbox: string; uid: number }> = [];
  readonly actions: RecordedAction[] = [];
  readonly unavailable = new Set<string>();
  readonly vanishOnFetch = new Set<number>();
  readonly failAction = new Set<number>();
  failCreate = false;
  connected = false;
  closed = false;
  private nextUid = 1000;

  addMailbox(name: string, messages: FakeMessage[] = []): this {
    this.mailboxes.set(name, [...messages]);
    return this;
  }

  messagesIn(name: string): FakeMessage[] {
    return this.mailboxes.get(name) ?? [];
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async listCandidates(mailbox: string, allMail: boolean): Promise<number[]> {
    const messages = this.mailboxes.get(mailbox);
    if (!messages || this.unavailable.has(mailbox)) {
      throw new MailboxError(`Mailbox doesn't exist: ${mailbox}`, mailbox);
    }
    return messages
      .filter(message => allMail || !message.seen)
      .map(message => message.uid)
      .sort((a, b) => a - b);
  }

  async fetch(mailbox: string, uid: number): Promise<Buffer> {
    const messages = this.messagesIn(mailbox);
    if (this.vanishOnFetch.has(uid)) {
      this.mailboxes.set(
        mailbox,
        messages.filter(message => message.uid !== uid),
      );
    }
    const message = this.messagesIn(mailbox).find(candidate => candidate.uid === uid);
    if (!message) {
      throw new FetchError(
        `Message ${uid} no longer exists in ${mailbox}`,
        mailbox,
        uid,
        ErrorCode.MESSAGE_NOT_FOUND,
      );
    }
    this.fetched.push({ mailbox, uid });
    return message.raw;
  }

  async applyAction(
    mailbox: string,
    uid: number,
    mode: TriageMode,
    destination: string,
  ): Promise<void> {
    const messages = this.messagesIn(mailbox);
    const message = messages.find(candidate => candidate.uid === uid);
    const target = this.mailboxes.get(destination);

    if (this.failAction.has(uid) || (mode === "move" && !target)) {
      throw new ActionError(`Cannot ${mode} message ${uid}`, ErrorCode.ACTION_FAILED, {
        mailbox,
        uid,
      });
    }

    this.actions.push({ mailbox, uid, mode, destination });
    if (!message) {
      return;
    }
    this.mailboxes.set(
      mailbox,
      messages.filter(candidate => candidate.uid !== uid),
    );
    if (mode === "move" && target) {
      target.push({ ...message, uid: this.nextUid++ });
    }
  }

  async ensureMailbox(path: string): Promise<"exists" | "created"> {
    if (this.mailboxes.has(path)) {
      return "exists";
    }
    if (this.failCreate) {
      throw new ActionError(
        `Mailbox ${path} is missing and could not be created`,
        ErrorCode.DESTINATION_UNAVAILABLE,
        { mailbox: path },
      );
    }
    this.mailboxes.set(path, []);
    return "created";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Answers with the X-Test-Score header of the message. A non-numeric
 * header is a protocol error; `unavailableOnCall` makes that call fail
 * as if spamd were down.
 */
export class FakeScorer implements SpamScorer {
  calls = 0;
  unavailableOnCall?: number;
  readonly learned = new Set<string>();

  async score(raw: Buffer): Promise<number> {
    this.calls++;
    if (this.unavailableOnCall !== undefined && this.calls >= this.unavailableOnCall) {
      throw new ScorerUnavailableError("connect ECONNREFUSED 127.0.0.1:783", "localhost:783");
    }

    const header = /X-Test-Score: (\S+)/.exec(raw.toString("utf8"));
    const score = header ? Number(header[1]) : Number.NaN;
    if (Number.isNaN(score)) {
      throw new ScorerProtocolError("Unparseable Spam header: 'garbage'");
    }
    return score;
  }

  async learn(raw: Buffer): Promise<boolean> {
    this.calls++;
    if (this.unavailableOnCall !== undefined && this.calls >= this.unavailableOnCall) {
      throw new ScorerUnavailableError("connect ECONNREFUSED 127.0.0.1:783", "localhost:783");
    }

    const text = raw.toString("utf8");
    if (text.includes("X-Test-Score: garbage")) {
      throw new ScorerProtocolError("TELL failed with code 69: EX_UNAVAILABLE");
    }
    if (this.learned.has(text)) {
      return false;
    }
    this.learned.add(text);
    return true;
  }
}

export function triageConfig(overrides: Partial<TriageConfig> = {}): TriageConfig {
  return {
    imap: {
      host: "imap.example.com",
      port: 993,
      secure: true,
      user: "alice",
      password: "test-secret",
    },
    spamd: { host: "localhost", port: 783 },
    mailboxes: [],
    allMail: false,
    mode: "move",
    destination: "Spam",
    threshold: 4.5,
    learn: false,
    verbosity: 0,
    ...overrides,
  };
}
