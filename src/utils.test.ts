import { describe, it, expect } from "vitest";
import { SimpleIdGenerator, escapeHtml } from "./utils.js";

// ---------------------------------------------------------------------------
// SimpleIdGenerator
// ---------------------------------------------------------------------------

describe("SimpleIdGenerator", () => {
  it("starts at 1", () => {
    const gen = new SimpleIdGenerator();
    expect(gen.next()).toBe("1");
    expect(gen.next()).toBe("2");
  });

  it("honours start and prefix", () => {
    const gen = new SimpleIdGenerator({ start: 10, prefix: "c" });
    expect(gen.next()).toBe("c11");
  });

  it("keeps separate counters per instance", () => {
    const a = new SimpleIdGenerator();
    const b = new SimpleIdGenerator();
    a.next();
    a.next();
    expect(b.next()).toBe("1");
  });
});

// ---------------------------------------------------------------------------
// escapeHtml
// ---------------------------------------------------------------------------

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
  });

  it("leaves plain text alone", () => {
    expect(escapeHtml("hello world")).toBe("hello world");
  });
});
