import { describe, expect, it } from "vitest";
import { formatLength, parseBitrate, parseLength } from "./trackFields.js";

describe("parseBitrate", () => {
  it("reads kbps", () => {
    expect(parseBitrate("746kbps")).toBe(746);
  });

  it.each(["0kbps", "746", "746 kbps", "746KBPS", "-5kbps", "kbps"])("rejects %j", (value) => {
    expect(parseBitrate(value)).toBeNull();
  });
});

describe("parseLength", () => {
  it.each([
    ["6:15", 375],
    ["4:05", 245],
    ["0:00", 0],
    ["125:00", 7500],
  ])("reads %s as %i seconds", (value, seconds) => {
    expect(parseLength(value)).toBe(seconds);
  });

  it.each(["6:75", "6:5", "6:150", ":15", "6.15", "1:02:03"])("rejects %j", (value) => {
    expect(parseLength(value)).toBeNull();
  });
});

describe("formatLength", () => {
  it("pads seconds", () => {
    expect(formatLength(245)).toBe("4:05");
    expect(formatLength(620)).toBe("10:20");
    expect(formatLength(0)).toBe("0:00");
  });
});
