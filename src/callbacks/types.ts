import type { Component } from "../component/component.js";
import type { RenderContext } from "../render/context.js";
import type { CallbackContext } from "../session/context.js";

export type CallbackKind = "input" | "action" | "live_update";

export type CallbackHandlers = {
  input: (value: string, ctx: CallbackContext) => void;
  action: (ctx: CallbackContext) => void;
  live_update: (r: RenderContext, ctx: CallbackContext) => void;
};

export type RegisteredCallback<K extends CallbackKind> = {
  readonly id: string;
  readonly kind: K;
  readonly component: Component;
  readonly handler: CallbackHandlers[K];
};

export type TriggeredCallback<K extends CallbackKind> = RegisteredCallback<K> & {
  readonly value: string;
};

export type ActionCallback = TriggeredCallback<"action">;
export type LiveUpdateCallback = TriggeredCallback<"live_update">;
