import type { CallbackStream } from "../callbacks/stream.js";
import type { ActionCallback, LiveUpdateCallback } from "../callbacks/types.js";
import { InvalidAnswerError, InvalidCallError } from "../infra/errors.js";
import type { RenderContext } from "../render/context.js";
import type { CallbackContext } from "../session/context.js";
import type { Snapshot } from "../snapshot/snapshot.js";
import type { Component } from "./component.js";
import { Decoration } from "./decoration.js";

let callsForbidden = false;

/** Runs `fn` with `Component.call` disabled; input callbacks run this way. */
export function withoutCalls<T>(fn: () => T): T {
  const previous = callsForbidden;
  callsForbidden = true;
  try {
    return fn();
  } finally {
    callsForbidden = previous;
  }
}

export function assertCallAllowed(caller: Component): void {
  if (callsForbidden) {
    throw new InvalidCallError(`${caller.constructor.name} cannot call a component from an input callback`);
  }
}

/** Installed on the caller: everything the caller would show goes to the callee instead. */
export class Delegate extends Decoration {
  constructor(readonly callee: Component) {
    super();
  }

  doRender(r: RenderContext): void {
    this.callee.renderChain(r);
  }

  processCallbacks(stream: CallbackStream, ctx: CallbackContext): ActionCallback | undefined {
    return this.callee.decoration.processCallbacks(stream, ctx);
  }

  firstLiveUpdate(stream: CallbackStream): LiveUpdateCallback | undefined {
    return this.callee.decoration.firstLiveUpdate(stream);
  }

  /** The callee's chain is captured, and so is the caller's behind it. */
  state(snapshot: Snapshot): void {
    this.callee.stateChain(snapshot);
    super.state(snapshot);
  }
}

/** Where control returns once the callee answers. */
export type Resumption<T> = {
  readonly caller: Component;
  readonly delegate: Delegate;
  readonly onAnswer?: (value: T) => void;
};

/** Installed on the callee; holds the caller's resumption until it is used. */
export class AnswerDecoration<T> extends Decoration {
  private answered = false;

  constructor(
    private readonly callee: Component<T>,
    private readonly resumption: Resumption<T>,
  ) {
    super();
  }

  get isAnswered(): boolean {
    return this.answered;
  }

  get caller(): Component {
    return this.resumption.caller;
  }

  state(snapshot: Snapshot): void {
    snapshot.add(this, "answered", this.answered, (answered) => {
      this.answered = answered;
    });
    super.state(snapshot);
  }

  /** Unlinks the call from both chains, then hands `value` to the caller. */
  resume(value: T): void {
    if (this.answered) {
      throw new InvalidAnswerError("Call has already been answered");
    }
    this.answered = true;
    this.callee.removeDecoration(this);
    this.resumption.caller.removeDecoration(this.resumption.delegate);
    this.resumption.onAnswer?.(value);
  }
}
