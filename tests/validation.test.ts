import * as v from "valibot";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/types/errors.js";
import {
  formatIssues,
  iniSectionSchema,
  portSchema,
  splitMailboxList,
  thresholdSchema,
  validateConfig,
} from "../src/validation/schemas.js";

describe("Validation Schemas", () => {
  describe("splitMailboxList", () => {
    it("should split on commas and semicolons", () => {
      expect(splitMailboxList("Junk, Lists;Archive")).toEqual(["Junk", "Lists", "Archive"]);
    });

    it("should drop empty names", () => {
      expect(splitMailboxList(" ,Junk,, ;")).toEqual(["Junk"]);
      expect(splitMailboxList("")).toEqual([]);
    });

    it("should keep spaces inside names", () => {
      expect(splitMailboxList("Old Mail, Junk E-mail")).toEqual(["Old Mail", "Junk E-mail"]);
    });
  });

  describe("portSchema", () => {
    it("should accept numeric strings and numbers", () => {
      expect(v.parse(portSchema, " 993 ")).toBe(993);
      expect(v.parse(portSchema, 143)).toBe(143);
    });

    it("should reject out-of-range and fractional ports", () => {
      expect(v.safeParse(portSchema, "0").success).toBe(false);
      expect(v.safeParse(portSchema, 65536).success).toBe(false);
      expect(v.safeParse(portSchema, "99.5").success).toBe(false);
      expect(v.safeParse(portSchema, "").success).toBe(false);
    });
  });

  describe("thresholdSchema", () => {
    it("should accept any finite number", () => {
      expect(v.parse(thresholdSchema, "4.5")).toBe(4.5);
      expect(v.parse(thresholdSchema, "-10")).toBe(-10);
    });

    it("should reject infinities and words", () => {
      expect(v.safeParse(thresholdSchema, "Infinity").success).toBe(false);
      expect(v.safeParse(thresholdSchema, "high").success).toBe(false);
    });
  });

  describe("iniSectionSchema", () => {
    it("should rename keys and coerce values", () => {
      const section = v.parse(iniSectionSchema, {
        user: " alice ",
        password: "test-secret",
        ssl: "ON",
        "all-mail": "0",
        boxes: ["Junk", "Lists;Archive"],
        treshold: "5",
        "spamd-socket": "/run/spamd.sock",
      });

      expect(section).toMatchObject({
        user: "alice",
        ssl: true,
        allMail: false,
        boxes: ["Junk", "Lists", "Archive"],
        threshold: 5,
        spamdSocket: "/run/spamd.sock",
      });
    });

    it("should reject unknown boolean words", () => {
      const result = v.safeParse(iniSectionSchema, {
        user: "alice",
        password: "test-secret",
        ssl: "maybe",
      });
      expect(result.success).toBe(false);
    });

    it("should ignore keys it does not know", () => {
      const section = v.parse(iniSectionSchema, {
        user: "alice",
        password: "test-secret",
        workers: "5",
      });
      expect(section).not.toHaveProperty("workers");
    });
  });

  describe("validateConfig", () => {
    const schema = v.object({ port: portSchema, name: v.pipe(v.string(), v.nonEmpty("name is required")) });

    it("should return the parsed output", () => {
      expect(validateConfig(schema, { port: "25", name: "relay" })).toEqual({
        port: 25,
        name: "relay",
      });
    });

    it("should throw a ConfigurationError naming each key", () => {
      expect(() => validateConfig(schema, { port: "0", name: "" }, "Relay")).toThrow(
        new ConfigurationError(
          "Relay validation failed: port: Port must be between 1 and 65535, name: name is required",
        ),
      );
    });

    it("should format root issues", () => {
      const result = v.safeParse(v.string("Expected a section"), 42);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.issues)).toBe("Expected a section");
      }
    });
  });
});
