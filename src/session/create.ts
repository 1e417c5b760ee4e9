import type { Component } from "../component/component.js";
import { resolveContentType, resolvePageIdParam, resolvePageStoreCapacity } from "../config/config.js";
import type { SprigConfig } from "../config/types.js";
import { MemoryPageStore } from "../page/memory-store.js";
import { Session, type SessionOptions } from "./session.js";

/** A session over an in-memory page store sized from configuration. */
export function createSession(
  root: Component,
  config: SprigConfig = {},
  overrides: Omit<SessionOptions, "root"> = {},
): Session {
  return new Session({
    pageStore: new MemoryPageStore(resolvePageStoreCapacity(config)),
    pageIdParam: resolvePageIdParam(config),
    contentType: resolveContentType(config),
    ...overrides,
    root,
  });
}
