import { createConnection, type Socket } from "node:net";
import type { SpamdConnection } from "../types/config.types.js";
import {
  ScorerProtocolError,
  ScorerUnavailableError,
} from "../types/errors.js";
import type { SpamScorer } from "../types/triage.types.js";
import { createLogger } from "./Logger.js";

const PROTOCOL_VERSION = "1.5";
const EX_OK = 0;
// spamc's own default
export const SPAMD_TIMEOUT_MS = 600_000;

export interface SpamdResponse {
  version: string;
  code: number;
  status: string;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

export interface SpamVerdict {
  isSpam: boolean;
  score: number;
  required: number;
}

/**
 * Parse a raw SPAMD response: status line, headers, blank line, optional body.
 */
export function parseSpamdResponse(text: string): SpamdResponse {
  const headerEnd = text.indexOf("\r\n\r\n");
  const head = headerEnd === -1 ? text : text.slice(0, headerEnd);
  const body = headerEnd === -1 ? "" : text.slice(headerEnd + 4);
  const [statusLine = "", ...headerLines] = head.split("\r\n");

  const status = /^SPAMD\/(\d+\.\d+)\s+(\d+)\s*(.*)$/.exec(statusLine.trim());
  if (!status) {
    throw new ScorerProtocolError(
      `Malformed status line: '${statusLine.slice(0, 80)}'`,
      text,
    );
  }

  const headers: Record<string, string> = {};
  for (const line of headerLines) {
    const colon = line.indexOf(":");
    if (colon <= 0) {
      continue;
    }
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }

  return {
    version: status[1],
    code: Number(status[2]),
    status: status[3],
    headers,
    body,
  };
}

/**
 * Parse the value of a `Spam:` header, e.g. `True ; 15.2 / 5.0`
 */
export function parseSpamHeader(value: string): SpamVerdict {
  const match =
    /^(true|false|yes|no)\s*;\s*(-?\d+(?:\.\d+)?)\s*\/\s*(-?\d+(?:\.\d+)?)$/i.exec(
      value.trim(),
    );
  if (!match) {
    throw new ScorerProtocolError(`Unparseable Spam header: '${value}'`, value);
  }

  const verdict = match[1].toLowerCase();
  return {
    isSpam: verdict === "true" || verdict === "yes",
    score: Number.parseFloat(match[2]),
    required: Number.parseFloat(match[3]),
  };
}

/**
 * SpamAssassin daemon client speaking SPAMC over TCP or a Unix socket.
 * Every request uses its own connection, as spamc does.
 */
export class SpamdClient implements SpamScorer {
  private logger = createLogger("SpamdClient");

  constructor(
    private connection: SpamdConnection,
    private timeoutMs = SPAMD_TIMEOUT_MS,
  ) {}

  get endpoint(): string {
    return this.connection.socketPath ?? `${this.connection.host}:${this.connection.port}`;
  }

  async score(raw: Buffer): Promise<number> {
    const response = await this.request("CHECK", raw);
    this.ensureOk(response, "CHECK");

    const header = response.headers.spam;
    if (header === undefined) {
      throw new ScorerProtocolError("Response carries no Spam header", response.body);
    }

    const verdict = parseSpamHeader(header);
    this.logger.debug(
      `Scored message: ${verdict.score} / ${verdict.required}`,
      { operation: "score", service: "SpamdClient" },
      { isSpam: verdict.isSpam, bytes: raw.length },
    );
    return verdict.score;
  }

  /**
   * Needs spamd started with --allow-tell
   */
  async learn(raw: Buffer): Promise<boolean> {
    const response = await this.request("TELL", raw, [
      "Message-class: spam",
      "Set: local",
    ]);
    this.ensureOk(response, "TELL");

    const didSet = response.headers.didset;
    return didSet !== undefined && didSet.split(",").map(s => s.trim()).includes("local");
  }

  private ensureOk(response: SpamdResponse, command: string): void {
    if (response.code !== EX_OK) {
      throw new ScorerProtocolError(
        `${command} failed with code ${response.code}: ${response.status}`,
        response.status,
        { operation: command },
      );
    }
  }

  private openSocket(): Socket {
    if (this.connection.socketPath) {
      return createConnection({ path: this.connection.socketPath });
    }
    return createConnection({
      host: this.connection.host,
      port: this.connection.port,
    });
  }

  private request(
    command: string,
    raw: Buffer,
    extraHeaders: string[] = [],
  ): Promise<SpamdResponse> {
    const lines = [
      `${command} SPAMC/${PROTOCOL_VERSION}`,
      `Content-length: ${raw.length}`,
      ...extraHeaders,
    ];
    if (this.connection.user) {
      lines.push(`User: ${this.connection.user}`);
    }
    const head = `${lines.join("\r\n")}\r\n\r\n`;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let settled = false;
      const socket = this.openSocket();

      const finish = () => {
        if (settled) return;
        settled = true;
        const text = Buffer.concat(chunks).toString("utf8");
        if (text.length === 0) {
          reject(
            new ScorerProtocolError(`spamd closed the connection without answering ${command}`),
          );
          return;
        }
        try {
          resolve(parseSpamdResponse(text));
        } catch (error) {
          reject(error);
        }
      };

      socket.setTimeout(this.timeoutMs);
      socket.on("timeout", () => {
        if (settled) return;
        settled = true;
        socket.destroy();
        this.logger.error(
          `Cannot reach spamd at ${this.endpoint}`,
          { operation: command, service: "SpamdClient" },
          { error: `no answer within ${this.timeoutMs}ms` },
        );
        reject(
          new ScorerUnavailableError(
            `spamd at ${this.endpoint} did not answer within ${this.timeoutMs}ms`,
            this.endpoint,
            { operation: command },
          ),
        );
      });

      socket.on("connect", () => {
        socket.write(head);
        socket.end(raw);
      });

      socket.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.on("error", (error: Error) => {
        // spamd may answer and hang up before it has read the whole body
        if (chunks.length > 0) {
          finish();
          return;
        }
        if (settled) return;
        settled = true;
        this.logger.error(
          `Cannot reach spamd at ${this.endpoint}`,
          { operation: command, service: "SpamdClient" },
          { error: error.message },
        );
        reject(
          new ScorerUnavailableError(
            `spamd at ${this.endpoint} is unavailable: ${error.message}`,
            this.endpoint,
            { operation: command },
          ),
        );
      });

      socket.on("close", finish);
    });
  }
}
