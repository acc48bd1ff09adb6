import { simpleParser } from "mailparser";
import { createLogger } from "../services/Logger.js";

const logger = createLogger("messageSummary");

export interface MessageSummary {
  subject: string;
  from: string;
}

/**
 * Subject and sender of a raw message, for log lines. Only headers matter
 * here, so the body conversions mailparser would do are skipped.
 */
export async function summarizeMessage(raw: Buffer): Promise<MessageSummary> {
  try {
    const parsed = await simpleParser(raw, {
      skipHtmlToText: true,
      skipTextToHtml: true,
      skipImageLinks: true,
      skipTextLinks: true,
    });

    return {
      subject: parsed.subject || "(no subject)",
      from: parsed.from?.value[0]?.address || parsed.from?.text || "(unknown sender)",
    };
  } catch (error) {
    logger.debug("Could not parse message headers", { operation: "summarizeMessage" }, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { subject: "(unparseable)", from: "(unknown sender)" };
  }
}
