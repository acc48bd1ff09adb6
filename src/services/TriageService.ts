import type { TriageConfig } from "../types/config.types.js";
import {
  ActionError,
  FetchError,
  MailboxError,
  ScorerProtocolError,
} from "../types/errors.js";
import type {
  MailboxReport,
  MailSession,
  MessageOutcome,
  SpamScorer,
  TriageReport,
} from "../types/triage.types.js";
import { summarizeMessage } from "../utils/messageSummary.js";
import { LogLevel, createLogger } from "./Logger.js";

export const INBOX = "INBOX";

interface MailboxListing {
  mailbox: string;
  uids: number[];
}

/**
 * INBOX first, then the configured boxes in order, without repeats
 */
export function mailboxesToScan(extra: readonly string[]): string[] {
  const boxes = [INBOX];
  for (const box of extra) {
    const name = box.trim();
    if (!name || name.toUpperCase() === INBOX) continue;
    if (!boxes.includes(name)) boxes.push(name);
  }
  return boxes;
}

export function isSpam(score: number, threshold: number): boolean {
  return score > threshold;
}

/**
 * Scores candidate messages and moves or deletes the ones above threshold.
 *
 * All mailboxes are listed first, then per message: fetched → scored →
 * acted | skipped. Fetch failures, unparseable scorer answers and failed
 * actions skip the message. Anything
 * fatal (spamd gone, connection lost) propagates and ends the run; actions
 * already taken stay taken.
 */
export class TriageService {
  private logger = createLogger("TriageService");

  constructor(
    private session: MailSession,
    private scorer: SpamScorer,
    private config: Readonly<TriageConfig>,
  ) {}

  async run(): Promise<TriageReport> {
    if (this.config.mode === "move") {
      await this.prepareDestination();
    }

    // Every listing is taken before the first action, so a message moved
    // into a box scanned later in the run is not seen twice
    const listings: Array<MailboxReport | MailboxListing> = [];
    for (const mailbox of mailboxesToScan(this.config.mailboxes)) {
      listings.push(await this.listMailbox(mailbox));
    }

    const reports: MailboxReport[] = [];
    for (const listing of listings) {
      reports.push(
        "uids" in listing
          ? await this.triageMailbox(listing.mailbox, listing.uids)
          : listing,
      );
    }

    const outcomes = reports.flatMap(report => report.outcomes);
    return {
      mailboxes: reports,
      acted: outcomes.filter(outcome => outcome.state === "acted").length,
      skipped: outcomes.filter(outcome => outcome.state === "skipped").length,
    };
  }

  /**
   * Candidate UIDs of one mailbox, or the report of a mailbox that could not be opened
   */
  async listMailbox(
    mailbox: string,
  ): Promise<MailboxReport | MailboxListing> {
    try {
      const uids = await this.session.listCandidates(mailbox, this.config.allMail);
      return { mailbox, uids };
    } catch (error) {
      if (error instanceof MailboxError) {
        this.logger.warning(error.getUserMessage(), {
          operation: "listMailbox",
          mailbox,
        }, { error: error.message });
        return {
          mailbox,
          opened: false,
          candidates: 0,
          outcomes: [],
          error: error.message,
        };
      }
      throw error;
    }
  }

  async triageMailbox(mailbox: string, candidates: number[]): Promise<MailboxReport> {
    const timer = this.logger.startTimer(`triage:${mailbox}`);

    const outcomes: MessageOutcome[] = [];
    for (const uid of candidates) {
      outcomes.push(await this.triageMessage(mailbox, uid));
    }

    const acted = outcomes.filter(outcome => outcome.state === "acted").length;
    this.logger.notice(`${mailbox}: ${acted} spam messages found`, {
      operation: "triageMailbox",
      mailbox,
      duration: timer.end(true),
    }, { candidates: candidates.length, mode: this.config.mode });

    return { mailbox, opened: true, candidates: candidates.length, outcomes };
  }

  async triageMessage(mailbox: string, uid: number): Promise<MessageOutcome> {
    const context = { operation: "triageMessage", mailbox, uid };

    let raw: Buffer;
    try {
      raw = await this.session.fetch(mailbox, uid);
    } catch (error) {
      if (error instanceof FetchError) {
        this.logger.warning(error.getUserMessage(), context);
        return { uid, state: "skipped", reason: "fetch-failed" };
      }
      throw error;
    }

    let score: number;
    try {
      score = await this.scorer.score(raw);
    } catch (error) {
      if (error instanceof ScorerProtocolError) {
        this.logger.warning(error.getUserMessage(), context);
        return { uid, state: "skipped", reason: "scorer-protocol-error" };
      }
      throw error;
    }

    if (!isSpam(score, this.config.threshold)) {
      this.logger.debug(`Score ${score} <= ${this.config.threshold}, leaving message`, context);
      return { uid, state: "skipped", reason: "below-threshold", score };
    }

    try {
      await this.session.applyAction(
        mailbox,
        uid,
        this.config.mode,
        this.config.destination,
      );
    } catch (error) {
      if (error instanceof ActionError) {
        this.logger.warning(error.getUserMessage(), context, { error: error.message });
        return { uid, state: "skipped", reason: "action-failed", score };
      }
      throw error;
    }

    if (this.logger.isLevelEnabled(LogLevel.INFO)) {
      const summary = await summarizeMessage(raw);
      this.logger.info(
        this.config.mode === "move"
          ? `Moved to ${this.config.destination} (score ${score})`
          : `Deleted (score ${score})`,
        context,
        { subject: summary.subject, from: summary.from },
      );
    }

    return { uid, state: "acted", reason: "above-threshold", score };
  }

  private async prepareDestination(): Promise<void> {
    try {
      await this.session.ensureMailbox(this.config.destination);
    } catch (error) {
      if (error instanceof ActionError) {
        this.logger.warning(error.getUserMessage(), {
          operation: "prepareDestination",
          mailbox: this.config.destination,
        }, { error: error.message });
        return;
      }
      throw error;
    }
  }
}
