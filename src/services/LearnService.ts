import { FetchError, ScorerProtocolError } from "../types/errors.js";
import type { LearnReport, MailSession, SpamScorer } from "../types/triage.types.js";
import { createLogger } from "./Logger.js";

/**
 * Feeds every message of the spam mailbox to spamd's Bayes learner.
 * Messages are only read, never flagged or moved.
 */
export class LearnService {
  private logger = createLogger("LearnService");

  constructor(
    private session: MailSession,
    private scorer: SpamScorer,
  ) {}

  async run(mailbox: string): Promise<LearnReport> {
    this.logger.info(`Starting learning mode on mailbox ${mailbox}`, {
      operation: "learn",
      mailbox,
    });
    const timer = this.logger.startTimer(`learn:${mailbox}`);

    // A MailboxError here is fatal: there is nothing to learn from
    const uids = await this.session.listCandidates(mailbox, true);
    const report: LearnReport = {
      mailbox,
      candidates: uids.length,
      learned: 0,
      alreadyKnown: 0,
      failed: 0,
    };

    for (const uid of uids) {
      try {
        const raw = await this.session.fetch(mailbox, uid);
        if (await this.scorer.learn(raw)) {
          report.learned++;
        } else {
          report.alreadyKnown++;
        }
      } catch (error) {
        if (error instanceof FetchError || error instanceof ScorerProtocolError) {
          this.logger.warning(`Could not learn UID ${uid}`, {
            operation: "learn",
            mailbox,
            uid,
          }, { error: error.message });
          report.failed++;
          continue;
        }
        throw error;
      }
    }

    this.logger.notice(`Learned ${report.learned} new messages.`, {
      operation: "learn",
      mailbox,
      duration: timer.end(true),
    }, {
      alreadyKnown: report.alreadyKnown,
      failed: report.failed,
    });

    return report;
  }
}
