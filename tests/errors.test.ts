import { describe, expect, it } from "vitest";
import {
  ActionError,
  AuthError,
  CheckerError,
  ConfigurationError,
  ConnectionError,
  ErrorCode,
  FetchError,
  MailboxError,
  ScorerProtocolError,
  ScorerUnavailableError,
  getUserMessage,
  isFatalError,
  toCheckerError,
} from "../src/types/errors.js";

describe("Checker error types", () => {
  describe("ConnectionError", () => {
    it("should create a fatal connection error", () => {
      const error = new ConnectionError("connect ECONNREFUSED 127.0.0.1:993");

      expect(error).toBeInstanceOf(CheckerError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("ConnectionError");
      expect(error.code).toBe(ErrorCode.CONNECTION_FAILED);
      expect(error.isFatal).toBe(true);
      expect(error.getUserMessage()).toBe(
        "Connection failed: check your network or the IMAP server name.",
      );
    });

    it("should provide specific user messages for connection codes", () => {
      expect(
        new ConnectionError("refused", ErrorCode.CONNECTION_REFUSED).getUserMessage(),
      ).toBe("The IMAP server refused the connection. Check the server name and port.");
      expect(
        new ConnectionError("dns", ErrorCode.HOST_NOT_FOUND).getUserMessage(),
      ).toBe("The IMAP server name could not be resolved.");
      expect(
        new ConnectionError("lost", ErrorCode.CONNECTION_LOST).getUserMessage(),
      ).toBe("The connection to the IMAP server was lost during the run.");
    });
  });

  describe("AuthError", () => {
    it("should be fatal and hide the server's wording", () => {
      const error = new AuthError("AUTHENTICATIONFAILED Invalid credentials");

      expect(error.code).toBe(ErrorCode.AUTH_FAILED);
      expect(error.isFatal).toBe(true);
      expect(error.getUserMessage()).toBe("Login failed. Check your username/password.");
    });
  });

  describe("ScorerUnavailableError", () => {
    it("should name the endpoint", () => {
      const error = new ScorerUnavailableError("ECONNREFUSED", "localhost:783");

      expect(error.isFatal).toBe(true);
      expect(error.endpoint).toBe("localhost:783");
      expect(error.getUserMessage()).toBe(
        "Cannot reach spamd at localhost:783. Is the daemon running?",
      );
    });
  });

  describe("recoverable errors", () => {
    it("should keep mailbox and uid on FetchError", () => {
      const error = new FetchError("gone", "INBOX", 42, ErrorCode.MESSAGE_NOT_FOUND);

      expect(error.isFatal).toBe(false);
      expect(error.context.mailbox).toBe("INBOX");
      expect(error.context.uid).toBe(42);
      expect(error.getUserMessage()).toBe("Message 42 is no longer in INBOX.");
      expect(new FetchError("boom", "Junk", 7).getUserMessage()).toBe(
        "Could not fetch message 7 from Junk.",
      );
    });

    it("should describe ActionError by code", () => {
      const failed = new ActionError("NO [TRYCREATE]", ErrorCode.ACTION_FAILED, {
        mailbox: "INBOX",
        uid: 3,
      });
      const missing = new ActionError("cannot create", ErrorCode.DESTINATION_UNAVAILABLE);

      expect(failed.isFatal).toBe(false);
      expect(failed.getUserMessage()).toBe(
        "Could not act on message 3 in INBOX; it was left in place.",
      );
      expect(missing.getUserMessage()).toBe(
        "The destination mailbox does not exist and could not be created.",
      );
    });

    it("should not treat MailboxError or ScorerProtocolError as fatal", () => {
      expect(isFatalError(new MailboxError("NO such mailbox", "Archive"))).toBe(false);
      expect(isFatalError(new ScorerProtocolError("bad status"))).toBe(false);
      expect(new MailboxError("NO", "Archive").getUserMessage()).toBe(
        "Cannot select mailbox Archive.",
      );
    });
  });

  describe("ConfigurationError", () => {
    it("should mention the key when there is one", () => {
      expect(new ConfigurationError("must be a number", "port").getUserMessage()).toBe(
        "Configuration error for 'port': must be a number",
      );
      expect(new ConfigurationError("user is required").getUserMessage()).toBe(
        "Configuration error: user is required",
      );
    });
  });

  describe("helpers", () => {
    it("should treat foreign errors as fatal", () => {
      expect(isFatalError(new Error("boom"))).toBe(true);
      expect(isFatalError("boom")).toBe(true);
    });

    it("should build user messages for anything thrown", () => {
      expect(getUserMessage(new AuthError("x"))).toBe(
        "Login failed. Check your username/password.",
      );
      expect(getUserMessage(new TypeError("oops"))).toBe("Unexpected error: oops");
      expect(getUserMessage(17)).toBe("Unexpected error: 17");
    });

    it("should wrap unknown errors and keep checker errors", () => {
      const original = new FetchError("boom", "INBOX", 1);
      expect(toCheckerError(original)).toBe(original);

      const wrapped = toCheckerError(new RangeError("out of range"), { operation: "run" });
      expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(wrapped.isFatal).toBe(true);
      expect(wrapped.context.operation).toBe("run");
      expect(wrapped.getUserMessage()).toBe("Unexpected error: out of range");
    });

    it("should serialize to JSON", () => {
      const json = new ScorerProtocolError("bad header", "Spam: maybe").toJSON();

      expect(json.name).toBe("ScorerProtocolError");
      expect(json.code).toBe(ErrorCode.SCORER_PROTOCOL);
      expect(json.isFatal).toBe(false);
    });
  });
});
