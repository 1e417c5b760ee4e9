import { describe, it, expect } from "vitest";
import { createRequest } from "./request.js";
import { contentResponse, redirectResponse } from "./response.js";

describe("createRequest", () => {
  it("has no page id when the query lacks one", () => {
    const req = createRequest({ url: "/app" });
    expect(req.pageId).toBeUndefined();
    expect(req.isRenderRequest()).toBe(true);
  });

  it("reads the page id from the query", () => {
    const req = createRequest({ url: "/app?page_id=7" });
    expect(req.pageId).toBe("7");
    expect(req.fields).toEqual({});
    expect(req.isRenderRequest()).toBe(true);
  });

  it("honours a custom page id parameter", () => {
    const req = createRequest({ url: "/app?p=3&page_id=x", pageIdParam: "p" });
    expect(req.pageId).toBe("3");
    expect(req.fields).toEqual({ page_id: "x" });
  });

  it("treats other query parameters as submitted fields", () => {
    const req = createRequest({ url: "/app?page_id=2&12=" });
    expect(req.fields).toEqual({ "12": "" });
    expect(req.isRenderRequest()).toBe(false);
  });

  it("merges explicit fields over query fields", () => {
    const req = createRequest({ url: "/app?page_id=2&4=a", fields: { "4": "b", "5": "c" } });
    expect(req.fields).toEqual({ "4": "b", "5": "c" });
  });

  it("builds urls carrying only the given parameters", () => {
    const req = createRequest({ url: "/app/todo?page_id=2&9=" });
    expect(req.buildUrl({ page_id: "3" })).toBe("/app/todo?page_id=3");
    expect(req.buildUrl({ page_id: "3", section: "b" })).toBe("/app/todo?page_id=3&section=b");
    expect(req.buildUrl({ page_id: undefined })).toBe("/app/todo");
  });

  it("builds root-relative urls for the root path", () => {
    expect(createRequest({ url: "/" }).buildUrl({ page_id: "1" })).toBe("/?page_id=1");
  });
});

describe("responses", () => {
  it("creates content responses with a default content type", () => {
    expect(contentResponse("<p>hi</p>")).toEqual({
      kind: "content",
      contentType: "text/html",
      body: "<p>hi</p>",
    });
  });

  it("creates redirect responses", () => {
    expect(redirectResponse("/?page_id=4")).toEqual({ kind: "redirect", location: "/?page_id=4" });
  });
});
