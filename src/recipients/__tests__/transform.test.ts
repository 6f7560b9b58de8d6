/**
 * Recipients Transform Tests
 */
import { describe, expect, it } from "vitest";

import { type Recipient, RecipientEntrySchema } from "../schema.js";
import {
  findDuplicateTargets,
  normalizeRecipient,
  recipientTimeZone,
} from "../transform.js";

const recipient = (target: string, timeZone: string | null = null): Recipient => ({
  target,
  startupMessage: false,
  timeOfDay: null,
  timeZone,
});

describe("Recipients Transform", () => {
  describe("normalizeRecipient", () => {
    it("expands the string shorthand", () => {
      const entry = RecipientEntrySchema.parse("mobile_app_pixel");

      expect(normalizeRecipient(entry)).toEqual({
        target: "mobile_app_pixel",
        startupMessage: false,
        timeOfDay: null,
        timeZone: null,
      });
    });

    it("keeps configured options", () => {
      const entry = RecipientEntrySchema.parse({
        target: "mobile_app_pixel",
        startupMessage: true,
        timeOfDay: "07:30",
        timeZone: "Europe/Stockholm",
      });

      expect(normalizeRecipient(entry)).toEqual({
        target: "mobile_app_pixel",
        startupMessage: true,
        timeOfDay: "07:30",
        timeZone: "Europe/Stockholm",
      });
    });

    it("defaults startupMessage to false", () => {
      const entry = RecipientEntrySchema.parse({ target: "tablet" });

      expect(normalizeRecipient(entry).startupMessage).toBe(false);
    });
  });

  describe("RecipientEntrySchema", () => {
    it("rejects targets that are not notify service names", () => {
      expect(RecipientEntrySchema.safeParse("notify.phone").success).toBe(false);
      expect(RecipientEntrySchema.safeParse("").success).toBe(false);
    });

    it("rejects malformed timeOfDay", () => {
      const result = RecipientEntrySchema.safeParse({
        target: "phone",
        timeOfDay: "7am",
      });

      expect(result.success).toBe(false);
    });
  });

  describe("recipientTimeZone", () => {
    it("falls back to the default zone", () => {
      expect(recipientTimeZone(recipient("a"), "UTC")).toBe("UTC");
    });

    it("prefers the recipient's zone", () => {
      expect(recipientTimeZone(recipient("a", "Europe/Oslo"), "UTC")).toBe(
        "Europe/Oslo",
      );
    });
  });

  describe("findDuplicateTargets", () => {
    it("returns targets listed more than once", () => {
      const list = [recipient("a"), recipient("b"), recipient("a"), recipient("a")];

      expect(findDuplicateTargets(list)).toEqual(["a"]);
    });

    it("returns an empty list for unique targets", () => {
      expect(findDuplicateTargets([recipient("a"), recipient("b")])).toEqual([]);
    });
  });
});
