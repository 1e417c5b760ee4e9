import type { CallbackRegistry } from "../callbacks/registry.js";
import type { Snapshot } from "../snapshot/snapshot.js";

/** One rendered view: the state to restore plus the callbacks it registered. */
export type Page = {
  readonly snapshot: Snapshot;
  readonly callbacks: CallbackRegistry;
};

export interface PageStore {
  /**
   * Looks up a page. With `touch` set the store may treat the read as a use
   * for its eviction policy.
   */
  fetch(pageId: string, touch?: boolean): Page | undefined;
  put(pageId: string, page: Page): void;
}

export function createPage(snapshot: Snapshot, callbacks: CallbackRegistry): Page {
  return { snapshot, callbacks };
}
