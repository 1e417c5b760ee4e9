import type { Component } from "../component/component.js";
import type { IdGenerator } from "../utils.js";
import type { CallbackHandlers, CallbackKind, RegisteredCallback } from "./types.js";

type CallbackTable = { [K in CallbackKind]: Map<string, RegisteredCallback<K>> };

/**
 * Callbacks registered while rendering one page. Ids come from the supplied
 * generator; a session shares one generator across all its registries, so an
 * id from a replaced registry never resolves in its successor.
 */
export class CallbackRegistry {
  private readonly table: CallbackTable = {
    input: new Map(),
    action: new Map(),
    live_update: new Map(),
  };

  constructor(private readonly idgen: IdGenerator) {}

  register<K extends CallbackKind>(component: Component, kind: K, handler: CallbackHandlers[K]): string {
    const id = this.idgen.next();
    const callbacks: Map<string, RegisteredCallback<K>> = this.table[kind];
    callbacks.set(id, { id, kind, component, handler });
    return id;
  }

  get<K extends CallbackKind>(kind: K, id: string): RegisteredCallback<K> | undefined {
    const callbacks: Map<string, RegisteredCallback<K>> = this.table[kind];
    return callbacks.get(id);
  }

  /** Callbacks of one kind in registration order. */
  list<K extends CallbackKind>(kind: K): readonly RegisteredCallback<K>[] {
    const callbacks: Map<string, RegisteredCallback<K>> = this.table[kind];
    return [...callbacks.values()];
  }

  has(id: string): boolean {
    return this.table.input.has(id) || this.table.action.has(id) || this.table.live_update.has(id);
  }

  get size(): number {
    return this.table.input.size + this.table.action.size + this.table.live_update.size;
  }
}
