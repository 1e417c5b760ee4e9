import { createLogger } from "../logging.js";
import type { Page, PageStore } from "./page.js";

const log = createLogger("page-store");

/** Page store holding at most `capacity` pages; least recently used go first. */
export class MemoryPageStore implements PageStore {
  private readonly pages = new Map<string, Page>();
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("Page store capacity must be a positive integer");
    }
    this.capacity = capacity;
  }

  fetch(pageId: string, touch = true): Page | undefined {
    const page = this.pages.get(pageId);
    if (page && touch) {
      this.pages.delete(pageId);
      this.pages.set(pageId, page);
    }
    return page;
  }

  put(pageId: string, page: Page): void {
    this.pages.delete(pageId);
    this.pages.set(pageId, page);
    while (this.pages.size > this.capacity) {
      const oldest = this.pages.keys().next();
      if (oldest.done) break;
      this.pages.delete(oldest.value);
      log.debug(`Evicted page ${oldest.value}`);
    }
  }

  has(pageId: string): boolean {
    return this.pages.has(pageId);
  }

  get size(): number {
    return this.pages.size;
  }

  /** Page ids from least to most recently used. */
  keys(): string[] {
    return [...this.pages.keys()];
  }
}
