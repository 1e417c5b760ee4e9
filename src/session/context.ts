import type { CallbackKind } from "../callbacks/types.js";
import type { SessionRequest } from "../http/request.js";
import { redirectResponse, type SessionResponse } from "../http/response.js";
import type { Page } from "../page/page.js";

/**
 * Thrown by `CallbackContext.respond` to leave callback dispatch early. Only
 * the session catches it; it is a successful outcome, not a failure.
 */
export class PrematureResponse {
  constructor(readonly response: SessionResponse) {}
}

/** Request-scoped state handed to every callback of one dispatch. */
export class CallbackContext {
  phase: CallbackKind = "input";

  constructor(
    readonly request: SessionRequest,
    readonly pageId: string,
    readonly page: Page,
  ) {}

  /** Ends dispatch and sends `response`; the page keeps its id. */
  respond(response: SessionResponse): never {
    throw new PrematureResponse(response);
  }

  redirect(location: string): never {
    return this.respond(redirectResponse(location));
  }
}
