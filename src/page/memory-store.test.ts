import { describe, it, expect } from "vitest";
import { MemoryPageStore } from "./memory-store.js";
import { createPage, type Page } from "./page.js";
import { CallbackRegistry } from "../callbacks/registry.js";
import { Snapshot } from "../snapshot/snapshot.js";
import { SimpleIdGenerator } from "../utils.js";

function makePage(): Page {
  return createPage(new Snapshot().freeze(), new CallbackRegistry(new SimpleIdGenerator()));
}

describe("MemoryPageStore", () => {
  it("rejects non-positive capacities", () => {
    expect(() => new MemoryPageStore(0)).toThrow("Page store capacity must be a positive integer");
    expect(() => new MemoryPageStore(1.5)).toThrow("Page store capacity must be a positive integer");
  });

  it("returns undefined for unknown ids", () => {
    expect(new MemoryPageStore(2).fetch("missing")).toBeUndefined();
  });

  it("stores and fetches pages", () => {
    const store = new MemoryPageStore(2);
    const page = makePage();
    store.put("1", page);
    expect(store.fetch("1")).toBe(page);
  });

  it("replaces pages stored under the same id", () => {
    const store = new MemoryPageStore(2);
    const replacement = makePage();
    store.put("1", makePage());
    store.put("1", replacement);
    expect(store.fetch("1")).toBe(replacement);
    expect(store.size).toBe(1);
  });

  it("evicts the least recently used page", () => {
    const store = new MemoryPageStore(2);
    store.put("1", makePage());
    store.put("2", makePage());
    store.put("3", makePage());
    expect(store.has("1")).toBe(false);
    expect(store.keys()).toEqual(["2", "3"]);
  });

  it("counts touching fetches as use", () => {
    const store = new MemoryPageStore(2);
    store.put("1", makePage());
    store.put("2", makePage());
    store.fetch("1", true);
    store.put("3", makePage());
    expect(store.keys()).toEqual(["1", "3"]);
  });

  it("leaves the order alone for non-touching fetches", () => {
    const store = new MemoryPageStore(2);
    store.put("1", makePage());
    store.put("2", makePage());
    store.fetch("1", false);
    store.put("3", makePage());
    expect(store.keys()).toEqual(["2", "3"]);
  });
});
