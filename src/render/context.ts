import type { CallbackRegistry } from "../callbacks/registry.js";
import type { CallbackHandlers, CallbackKind } from "../callbacks/types.js";
import type { Component } from "../component/component.js";
import type { SessionRequest } from "../http/request.js";
import { DEFAULT_PAGE_ID_PARAM } from "../config/config.js";
import { escapeHtml } from "../utils.js";

export type RenderContextOptions = {
  request: SessionRequest;
  callbacks: CallbackRegistry;
  pageIdParam?: string;
};

/**
 * Output sink for one render pass. Callbacks registered here are bound to the
 * component currently rendering and land in the page's registry.
 */
export class RenderContext {
  readonly request: SessionRequest;
  readonly callbacks: CallbackRegistry;
  private readonly pageIdParam: string;
  private readonly chunks: string[] = [];
  private current: Component | undefined;

  constructor(options: RenderContextOptions) {
    this.request = options.request;
    this.callbacks = options.callbacks;
    this.pageIdParam = options.pageIdParam ?? DEFAULT_PAGE_ID_PARAM;
  }

  get component(): Component {
    if (!this.current) {
      throw new Error("No component is rendering");
    }
    return this.current;
  }

  withComponent(component: Component, fn: () => void): void {
    const previous = this.current;
    this.current = component;
    try {
      fn();
    } finally {
      this.current = previous;
    }
  }

  /** Renders `component` through its decoration chain. */
  render(component: Component): this {
    component.renderChain(this);
    return this;
  }

  raw(html: string): this {
    this.chunks.push(html);
    return this;
  }

  text(content: string): this {
    this.chunks.push(escapeHtml(content));
    return this;
  }

  callback<K extends CallbackKind>(kind: K, handler: CallbackHandlers[K]): string {
    return this.callbacks.register(this.component, kind, handler);
  }

  /** URL of the page being rendered, without callback parameters. */
  formAction(): string {
    return this.request.buildUrl({ [this.pageIdParam]: this.request.pageId });
  }

  anchor(label: string, action: CallbackHandlers["action"]): this {
    const id = this.callback("action", action);
    const href = this.request.buildUrl({ [this.pageIdParam]: this.request.pageId, [id]: "" });
    return this.raw(`<a href="${escapeHtml(href)}">${escapeHtml(label)}</a>`);
  }

  textInput(value: string, input: CallbackHandlers["input"]): this {
    const id = this.callback("input", input);
    return this.raw(`<input type="text" name="${escapeHtml(id)}" value="${escapeHtml(value)}">`);
  }

  submitButton(label: string, action: CallbackHandlers["action"]): this {
    const id = this.callback("action", action);
    return this.raw(`<input type="submit" name="${escapeHtml(id)}" value="${escapeHtml(label)}">`);
  }

  liveUpdate(handler: CallbackHandlers["live_update"]): string {
    return this.callback("live_update", handler);
  }

  output(): string {
    return this.chunks.join("");
  }
}
