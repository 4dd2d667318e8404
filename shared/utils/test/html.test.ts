import { describe, it, expect } from "vitest";
import { escapeHtml, escapeXml } from "../src/html";
import { getErrorCode, getErrorMessage } from "../src/error";

describe("escapeHtml", () => {
  it("should escape markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;",
    );
  });
});

describe("escapeXml", () => {
  it("should use the XML apostrophe entity", () => {
    expect(escapeXml("it's <ok>")).toBe("it&apos;s &lt;ok&gt;");
  });
});

describe("error helpers", () => {
  it("should read messages from errors and other values", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("plain")).toBe("plain");
  });

  it("should read system error codes", () => {
    const error = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(getErrorCode(error)).toBe("ENOENT");
    expect(getErrorCode(new Error("no code"))).toBeUndefined();
    expect(getErrorCode(null)).toBeUndefined();
  });
});
