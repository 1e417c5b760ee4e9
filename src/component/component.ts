import type { CallbackStream } from "../callbacks/stream.js";
import type { ActionCallback, LiveUpdateCallback } from "../callbacks/types.js";
import { DuplicateActionCallbackError, InvalidAnswerError } from "../infra/errors.js";
import type { RenderContext } from "../render/context.js";
import type { CallbackContext } from "../session/context.js";
import type { Snapshot } from "../snapshot/snapshot.js";
import { AnswerDecoration, assertCallAllowed, Delegate } from "./call-answer.js";
import { Decoration } from "./decoration.js";
import type { Presenter } from "./presenter.js";

const NO_CHILDREN: readonly Component[] = Object.freeze([]);

/**
 * Base class of all components. Subclasses override `render` for their view
 * and `children` when they embed other components.
 *
 * `TAnswer` is the type of value the component hands back when it was
 * invoked through `call`.
 */
export class Component<TAnswer = unknown> implements Presenter {
  /** Head of the decoration chain; the component itself when undecorated. */
  decoration: Presenter = this;

  render(_r: RenderContext): void {
    // renders nothing by default
  }

  children(): readonly Component[] {
    return NO_CHILDREN;
  }

  renderChain(r: RenderContext): void {
    this.decoration.doRender(r);
  }

  doRender(r: RenderContext): void {
    r.withComponent(this, () => this.render(r));
  }

  /**
   * Input callbacks of this component run first, then each child is asked
   * for its action, then this component's own. Two candidates in one subtree
   * are an error rather than a choice.
   */
  processCallbacks(stream: CallbackStream, ctx: CallbackContext): ActionCallback | undefined {
    for (const input of stream.triggered(this, "input")) {
      input.handler(input.value, ctx);
    }

    let action: ActionCallback | undefined;

    for (const child of this.children()) {
      const found = child.decoration.processCallbacks(stream, ctx);
      if (found) {
        if (action) throw new DuplicateActionCallbackError();
        action = found;
      }
    }

    const own = stream.first(this, "action");
    if (own) {
      if (action) throw new DuplicateActionCallbackError();
      action = own;
    }

    return action;
  }

  firstLiveUpdate(stream: CallbackStream): LiveUpdateCallback | undefined {
    for (const child of this.children()) {
      const found = child.decoration.firstLiveUpdate(stream);
      if (found) return found;
    }
    return stream.first(this, "live_update");
  }

  stateChain(snapshot: Snapshot): void {
    this.decoration.state(snapshot);
  }

  /**
   * Only the decoration chain takes part in backtracking by default. Override
   * and add entries to the snapshot to backtrack more.
   */
  state(snapshot: Snapshot): void {
    this.stateDecoration(snapshot);
    for (const child of this.children()) {
      child.stateChain(snapshot);
    }
  }

  protected stateDecoration(snapshot: Snapshot): void {
    snapshot.add(this, "decoration", this.decoration, (decoration) => {
      this.decoration = decoration;
    });
  }

  // ---------------------------------------------------------------------------
  // Decorations
  // ---------------------------------------------------------------------------

  addDecoration<D extends Decoration>(decoration: D): D {
    decoration.next = this.decoration;
    this.decoration = decoration;
    return decoration;
  }

  removeDecoration<D extends Decoration>(decoration: D): D {
    if (this.decoration === decoration) {
      this.decoration = decoration.target;
    } else {
      let previous = this.decoration;
      while (previous instanceof Decoration && previous.next !== decoration) {
        previous = previous.target;
      }
      if (!(previous instanceof Decoration)) {
        throw new Error(`Decoration ${decoration.constructor.name} not found`);
      }
      previous.next = decoration.next;
    }
    decoration.next = undefined;
    return decoration;
  }

  /** Decorations from head to tail. */
  decorations(): Decoration[] {
    const chain: Decoration[] = [];
    let link = this.decoration;
    while (link instanceof Decoration) {
      chain.push(link);
      link = link.target;
    }
    return chain;
  }

  findDecoration<D extends Decoration>(predicate: (decoration: Decoration) => decoration is D): D | undefined;
  findDecoration(predicate: (decoration: Decoration) => boolean): Decoration | undefined;
  findDecoration(predicate: (decoration: Decoration) => boolean): Decoration | undefined {
    return this.decorations().find(predicate);
  }

  // ---------------------------------------------------------------------------
  // Call / answer
  // ---------------------------------------------------------------------------

  /**
   * Shows `callee` in place of this component until it answers, then passes
   * the answer to `onAnswer`. The pending call is chain state, so it spans
   * requests and backtracks with the page.
   */
  call<T>(callee: Component<T>, onAnswer?: (value: T) => void): void {
    assertCallAllowed(this);
    const delegate = this.addDecoration(new Delegate(callee));
    callee.addDecoration(new AnswerDecoration<T>(callee, { caller: this, delegate, onAnswer }));
  }

  answer(value: TAnswer): void {
    const pending = this.findDecoration(
      (decoration): decoration is AnswerDecoration<TAnswer> => decoration instanceof AnswerDecoration,
    );
    if (!pending) {
      throw new InvalidAnswerError(`${this.constructor.name} has no pending call to answer`);
    }
    pending.resume(value);
  }
}
