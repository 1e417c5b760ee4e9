import type { Component } from "../component/component.js";
import type { RequestFields } from "../http/request.js";
import type { CallbackRegistry } from "./registry.js";
import type { CallbackKind, TriggeredCallback } from "./types.js";

type TriggeredTable = { [K in CallbackKind]: readonly TriggeredCallback<K>[] };

function collect<K extends CallbackKind>(
  registry: CallbackRegistry,
  kind: K,
  fields: RequestFields,
): readonly TriggeredCallback<K>[] {
  const triggered: TriggeredCallback<K>[] = [];
  for (const callback of registry.list(kind)) {
    const value = fields[callback.id];
    if (value !== undefined) {
      triggered.push({ ...callback, value });
    }
  }
  return triggered;
}

/** The callbacks of one registry that a single request's fields trigger. */
export class CallbackStream {
  private readonly table: TriggeredTable;

  constructor(registry: CallbackRegistry, fields: RequestFields) {
    this.table = {
      input: collect(registry, "input", fields),
      action: collect(registry, "action", fields),
      live_update: collect(registry, "live_update", fields),
    };
  }

  allOfKind<K extends CallbackKind>(kind: K): readonly TriggeredCallback<K>[] {
    const triggered: readonly TriggeredCallback<K>[] = this.table[kind];
    return triggered;
  }

  /** Triggered callbacks of `component`, in registration order. */
  triggered<K extends CallbackKind>(component: Component, kind: K): readonly TriggeredCallback<K>[] {
    return this.allOfKind(kind).filter((callback) => callback.component === component);
  }

  first<K extends CallbackKind>(component: Component, kind: K): TriggeredCallback<K> | undefined {
    return this.allOfKind(kind).find((callback) => callback.component === component);
  }

  get isEmpty(): boolean {
    return this.table.input.length === 0 && this.table.action.length === 0 && this.table.live_update.length === 0;
  }
}
