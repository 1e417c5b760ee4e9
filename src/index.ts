export { Component } from "./component/component.js";
export { Decoration } from "./component/decoration.js";
export type { Presenter } from "./component/presenter.js";
export { AnswerDecoration, Delegate, withoutCalls, type Resumption } from "./component/call-answer.js";
export { FormDecoration, PageDecoration, type PageDecorationOptions } from "./component/decorations.js";
export { decorateAsRoot, type RootOptions } from "./component/root.js";

export { CallbackRegistry } from "./callbacks/registry.js";
export { CallbackStream } from "./callbacks/stream.js";
export type {
  ActionCallback,
  CallbackHandlers,
  CallbackKind,
  LiveUpdateCallback,
  RegisteredCallback,
  TriggeredCallback,
} from "./callbacks/types.js";

export { Snapshot, type SnapshotEntry } from "./snapshot/snapshot.js";
export { createPage, type Page, type PageStore } from "./page/page.js";
export { MemoryPageStore } from "./page/memory-store.js";
export { RenderContext, type RenderContextOptions } from "./render/context.js";

export { createRequest, type CreateRequestOptions, type SessionRequest } from "./http/request.js";
export {
  contentResponse,
  redirectResponse,
  type ContentResponse,
  type RedirectResponse,
  type SessionResponse,
} from "./http/response.js";

export { Session, type InvalidPageHandler, type SessionOptions } from "./session/session.js";
export { CallbackContext, PrematureResponse } from "./session/context.js";
export { createSession } from "./session/create.js";

export { loadConfig, validateConfig } from "./config/config.js";
export type { SprigConfig } from "./config/types.js";
export {
  AppError,
  ConfigurationError,
  DuplicateActionCallbackError,
  formatError,
  InvalidAnswerError,
  InvalidCallError,
  InvalidPageIdError,
  MultipleActionCallbacksError,
} from "./infra/errors.js";
export { createLogger } from "./logging.js";
export { SimpleIdGenerator, type IdGenerator } from "./utils.js";
