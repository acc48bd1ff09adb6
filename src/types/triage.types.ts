import type { TriageMode } from "./config.types.js";

/**
 * Remote mailbox access as the triage and learn loops see it
 */
export interface MailSession {
  connect(): Promise<void>;
  /** UIDs in ascending order; unread only unless allMail is set */
  listCandidates(mailbox: string, allMail: boolean): Promise<number[]>;
  /** Raw RFC 822 bytes; never sets \Seen */
  fetch(mailbox: string, uid: number): Promise<Buffer>;
  applyAction(
    mailbox: string,
    uid: number,
    mode: TriageMode,
    destination: string,
  ): Promise<void>;
  ensureMailbox(path: string): Promise<"exists" | "created">;
  close(): Promise<void>;
}

export interface SpamScorer {
  score(raw: Buffer): Promise<number>;
  /** Teach the daemon that the message is spam. False when already known. */
  learn(raw: Buffer): Promise<boolean>;
}

export type SkipReason =
  | "below-threshold"
  | "fetch-failed"
  | "scorer-protocol-error"
  | "action-failed";

export type MessageOutcome =
  | { uid: number; state: "acted"; reason: "above-threshold"; score: number }
  | { uid: number; state: "skipped"; reason: SkipReason; score?: number };

export interface MailboxReport {
  mailbox: string;
  opened: boolean;
  candidates: number;
  outcomes: MessageOutcome[];
  error?: string;
}

export interface TriageReport {
  mailboxes: MailboxReport[];
  acted: number;
  skipped: number;
}

export interface LearnReport {
  mailbox: string;
  candidates: number;
  learned: number;
  alreadyKnown: number;
  failed: number;
}
