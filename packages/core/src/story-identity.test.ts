import { describe, it, expect } from "vitest";
import {
  StoryIdAllocator,
  formatCompactTimestamp,
  generateStoryId,
  getCurrentTimestamp,
} from "./story-identity.js";

const NOW = new Date("2026-10-18T10:00:00.123Z");

describe("generateStoryId", () => {
  it("joins the base name and a second-precision timestamp", () => {
    expect(generateStoryId("spec.txt", NOW, "Asia/Kolkata")).toBe("spec_20261018153000");
  });

  it("strips only the last extension", () => {
    expect(generateStoryId("login.flow.pdf", NOW, "UTC")).toBe("login.flow_20261018100000");
  });

  it("uses the base name of a path", () => {
    expect(generateStoryId("/intake/checkout.docx", NOW, "UTC")).toBe("checkout_20261018100000");
  });

  it("collides for the same base name within the same second", () => {
    const later = new Date("2026-10-18T10:00:00.900Z");
    expect(generateStoryId("a.txt", NOW, "UTC")).toBe(generateStoryId("a.pdf", later, "UTC"));
  });
});

describe("formatCompactTimestamp", () => {
  it("rolls over the date in the target zone", () => {
    const lateUtc = new Date("2026-10-18T20:45:09.000Z");
    expect(formatCompactTimestamp(lateUtc, "Asia/Kolkata")).toBe("20261019021509");
  });
});

describe("getCurrentTimestamp", () => {
  it.each([
    ["Asia/Kolkata", "2026-10-18T15:30:00.123+05:30"],
    ["UTC", "2026-10-18T10:00:00.123+00:00"],
    ["America/New_York", "2026-10-18T06:00:00.123-04:00"],
    ["Asia/Kathmandu", "2026-10-18T15:45:00.123+05:45"],
  ])("formats ISO-8601 with offset in %s", (timeZone, expected) => {
    expect(getCurrentTimestamp(timeZone, NOW)).toBe(expected);
  });

  it("follows daylight saving changes", () => {
    const winter = new Date("2026-01-15T12:00:00.000Z");
    expect(getCurrentTimestamp("America/New_York", winter)).toBe("2026-01-15T07:00:00.000-05:00");
  });

  it("defaults to Asia/Kolkata", () => {
    expect(getCurrentTimestamp(undefined, NOW)).toBe("2026-10-18T15:30:00.123+05:30");
  });
});

describe("StoryIdAllocator", () => {
  it("disambiguates same-second ids for a shared base name", () => {
    const ids = new StoryIdAllocator("UTC");

    expect(ids.next("story.txt", NOW)).toBe("story_20261018100000");
    expect(ids.next("story.pdf", NOW)).toBe("story_20261018100000_2");
    expect(ids.next("story.docx", NOW)).toBe("story_20261018100000_3");
  });

  it("leaves distinct base names and seconds untouched", () => {
    const ids = new StoryIdAllocator("UTC");

    expect(ids.next("a.txt", NOW)).toBe("a_20261018100000");
    expect(ids.next("b.txt", NOW)).toBe("b_20261018100000");
    expect(ids.next("a.txt", new Date("2026-10-18T10:00:01.000Z"))).toBe("a_20261018100001");
  });
});
