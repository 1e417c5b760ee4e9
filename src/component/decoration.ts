import type { CallbackStream } from "../callbacks/stream.js";
import type { ActionCallback, LiveUpdateCallback } from "../callbacks/types.js";
import type { RenderContext } from "../render/context.js";
import type { CallbackContext } from "../session/context.js";
import type { Snapshot } from "../snapshot/snapshot.js";
import type { Presenter } from "./presenter.js";

/**
 * A link in a component's decoration chain. The base class passes every call
 * on to `next`; subclasses intercept what they need.
 */
export abstract class Decoration implements Presenter {
  next: Presenter | undefined;

  /** `next`, or an error when the decoration has been detached. */
  get target(): Presenter {
    if (!this.next) {
      throw new Error(`${this.constructor.name} is not attached to a component`);
    }
    return this.next;
  }

  doRender(r: RenderContext): void {
    this.target.doRender(r);
  }

  processCallbacks(stream: CallbackStream, ctx: CallbackContext): ActionCallback | undefined {
    return this.target.processCallbacks(stream, ctx);
  }

  firstLiveUpdate(stream: CallbackStream): LiveUpdateCallback | undefined {
    return this.target.firstLiveUpdate(stream);
  }

  state(snapshot: Snapshot): void {
    snapshot.add(this, "next", this.next, (next) => {
      this.next = next;
    });
    this.target.state(snapshot);
  }
}
