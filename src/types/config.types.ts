export type TriageMode = "move" | "delete";

export const TRIAGE_MODES: readonly TriageMode[] = ["move", "delete"];

export interface ImapConnection {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  /** Windows domain; the login name becomes DOMAIN\user */
  domain?: string;
}

export interface SpamdConnection {
  host: string;
  port: number;
  /** Unix socket path; takes precedence over host and port */
  socketPath?: string;
  /** Forwarded as the SPAMC User header so spamd picks per-user settings */
  user?: string;
}

export interface TriageConfig {
  imap: ImapConnection;
  spamd: SpamdConnection;
  /** Scanned after INBOX, in this order */
  mailboxes: string[];
  allMail: boolean;
  mode: TriageMode;
  destination: string;
  threshold: number;
  learn: boolean;
  verbosity: number;
}

/**
 * Values given on the command line. Undefined means "not given", so the
 * ini file or the default can fill it in.
 */
export interface CliOptions {
  server: string;
  port?: number;
  ssl?: boolean;
  user?: string;
  password?: string;
  domain?: string;
  config?: string;
  mode?: TriageMode;
  destination?: string;
  threshold?: number;
  mailboxes?: string[];
  allMail?: boolean;
  learn?: boolean;
  verbose: number;
  spamdHost?: string;
  spamdPort?: number;
  spamdSocket?: string;
  spamdUser?: string;
}

/**
 * One validated section of the ini file
 */
export interface IniSection {
  user: string;
  password: string;
  domain?: string;
  port?: number;
  ssl?: boolean;
  boxes?: string[];
  allMail?: boolean;
  threshold?: number;
  mode?: TriageMode;
  destination?: string;
  spamdHost?: string;
  spamdPort?: number;
  spamdSocket?: string;
  spamdUser?: string;
}
