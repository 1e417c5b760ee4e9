import { CallbackRegistry } from "../callbacks/registry.js";
import { CallbackStream } from "../callbacks/stream.js";
import { withoutCalls } from "../component/call-answer.js";
import type { Component } from "../component/component.js";
import { DEFAULT_CONTENT_TYPE, DEFAULT_PAGE_ID_PARAM } from "../config/config.js";
import {
  ConfigurationError,
  formatError,
  InvalidPageIdError,
  MultipleActionCallbacksError,
} from "../infra/errors.js";
import type { SessionRequest } from "../http/request.js";
import { contentResponse, redirectResponse, type SessionResponse } from "../http/response.js";
import { createLogger } from "../logging.js";
import { createPage, type Page, type PageStore } from "../page/page.js";
import { RenderContext } from "../render/context.js";
import { Snapshot } from "../snapshot/snapshot.js";
import { SimpleIdGenerator, type IdGenerator } from "../utils.js";
import { CallbackContext, PrematureResponse } from "./context.js";

const log = createLogger("session");

export type InvalidPageHandler = (request: SessionRequest, pageId: string) => SessionResponse;

export type SessionOptions = {
  /** Required. */
  root?: Component;
  /** Required. */
  pageStore?: PageStore;
  pageIdParam?: string;
  contentType?: string;
  pageIds?: IdGenerator;
  callbackIds?: IdGenerator;
  /** Response for a page id the store cannot resolve. Defaults to raising `InvalidPageIdError`. */
  onInvalidPage?: InvalidPageHandler;
};

const rejectInvalidPage: InvalidPageHandler = (_request, pageId) => {
  throw new InvalidPageIdError(pageId);
};

/**
 * Serves the requests of one browser session against one component tree.
 * Every request that changes state ends on a freshly minted page id, so
 * reloading the result never runs a callback twice.
 */
export class Session {
  readonly root: Component;
  readonly pageStore: PageStore;
  private readonly pageIdParam: string;
  private readonly contentType: string;
  private readonly pageIds: IdGenerator;
  private readonly callbackIds: IdGenerator;
  private readonly onInvalidPage: InvalidPageHandler;
  private snapshotPageId: string | undefined;
  private processing = false;

  constructor(options: SessionOptions) {
    if (!options.root) {
      throw new ConfigurationError("No root component specified");
    }
    if (!options.pageStore) {
      throw new ConfigurationError("No page store specified");
    }
    this.root = options.root;
    this.pageStore = options.pageStore;
    this.pageIdParam = options.pageIdParam ?? DEFAULT_PAGE_ID_PARAM;
    this.contentType = options.contentType ?? DEFAULT_CONTENT_TYPE;
    this.pageIds = options.pageIds ?? new SimpleIdGenerator();
    this.callbackIds = options.callbackIds ?? new SimpleIdGenerator();
    this.onInvalidPage = options.onInvalidPage ?? rejectInvalidPage;
  }

  /** Id of the page whose snapshot the live tree currently reflects. */
  get restoredPageId(): string | undefined {
    return this.snapshotPageId;
  }

  handle(request: SessionRequest): SessionResponse {
    if (this.processing) {
      throw new Error("Session is already processing a request");
    }
    this.processing = true;
    try {
      return this.processRequest(request);
    } finally {
      this.processing = false;
    }
  }

  /** Captures the backtrackable state of the whole tree. */
  snapshot(): Snapshot {
    const snapshot = new Snapshot();
    this.root.stateChain(snapshot);
    return snapshot.freeze();
  }

  private processRequest(request: SessionRequest): SessionResponse {
    const pageId = request.pageId;
    if (pageId === undefined) {
      // Fresh start: mint a page and redirect, so reloading the entry URL
      // never repeats a callback.
      return this.handleNewPageView(request, this.snapshot());
    }

    const page = this.pageStore.fetch(pageId, false);
    if (!page) {
      log.warn(`Unknown or expired page id ${pageId}`);
      return this.onInvalidPage(request, pageId);
    }

    if (pageId !== this.snapshotPageId) {
      page.snapshot.restore();
      this.snapshotPageId = pageId;
      log.debug(`Restored snapshot of page ${pageId}`);
    }

    return request.isRenderRequest()
      ? this.handleRenderPhase(request, pageId, page)
      : this.handleCallbackPhase(request, pageId, page);
  }

  private handleRenderPhase(request: SessionRequest, pageId: string, page: Page): SessionResponse {
    // The fresh registry drops every callback id of the previous render.
    const rendered = this.newPage(page.snapshot);
    const r = new RenderContext({ request, callbacks: rendered.callbacks, pageIdParam: this.pageIdParam });
    this.root.renderChain(r);
    this.pageStore.put(pageId, rendered);
    return contentResponse(r.output(), this.contentType);
  }

  private handleCallbackPhase(request: SessionRequest, pageId: string, page: Page): SessionResponse {
    const stream = new CallbackStream(page.callbacks, request.fields);
    const actions = stream.allOfKind("action");
    if (actions.length > 1) {
      throw new MultipleActionCallbacksError(actions.map((action) => action.id));
    }

    const ctx = new CallbackContext(request, pageId, page);
    try {
      this.processCallbacks(stream, ctx);
    } catch (err) {
      if (!(err instanceof PrematureResponse)) {
        log.error(`Callback ${ctx.phase} phase failed on page ${pageId}: ${formatError(err)}`);
        // The tree may be half-updated; the next request must restore it.
        this.snapshotPageId = undefined;
        throw err;
      }
      log.debug(`Premature response during ${ctx.phase} phase of page ${pageId}`);
      this.pageStore.put(pageId, createPage(this.snapshot(), page.callbacks));
      this.snapshotPageId = pageId;
      return err.response;
    }

    return this.handleNewPageView(request, this.snapshot());
  }

  /** Inputs, then at most one action, then at most one live update. */
  private processCallbacks(stream: CallbackStream, ctx: CallbackContext): void {
    ctx.phase = "input";
    // Only input handlers run during collection; actions are returned, not run.
    const action = withoutCalls(() => this.root.decoration.processCallbacks(stream, ctx));

    if (action) {
      ctx.phase = "action";
      action.handler(ctx);
    }

    const liveUpdate = this.root.decoration.firstLiveUpdate(stream);
    if (liveUpdate) {
      ctx.phase = "live_update";
      const r = new RenderContext({
        request: ctx.request,
        callbacks: ctx.page.callbacks,
        pageIdParam: this.pageIdParam,
      });
      r.withComponent(liveUpdate.component, () => liveUpdate.handler(r, ctx));
      ctx.respond(contentResponse(r.output(), this.contentType));
    }
  }

  private handleNewPageView(request: SessionRequest, snapshot: Snapshot): SessionResponse {
    const pageId = this.pageIds.next();
    this.pageStore.put(pageId, this.newPage(snapshot));
    this.snapshotPageId = pageId;
    log.debug(`Created page ${pageId}`);
    return redirectResponse(request.buildUrl({ [this.pageIdParam]: pageId }));
  }

  private newPage(snapshot: Snapshot): Page {
    return createPage(snapshot, new CallbackRegistry(this.callbackIds));
  }
}
