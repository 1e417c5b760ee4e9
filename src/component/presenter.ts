import type { CallbackStream } from "../callbacks/stream.js";
import type { ActionCallback, LiveUpdateCallback } from "../callbacks/types.js";
import type { RenderContext } from "../render/context.js";
import type { CallbackContext } from "../session/context.js";
import type { Snapshot } from "../snapshot/snapshot.js";

/** What every link of a decoration chain, the component at its tail included, can do. */
export interface Presenter {
  doRender(r: RenderContext): void;
  /**
   * Runs triggered input callbacks and returns the single action callback
   * found, without invoking it.
   */
  processCallbacks(stream: CallbackStream, ctx: CallbackContext): ActionCallback | undefined;
  firstLiveUpdate(stream: CallbackStream): LiveUpdateCallback | undefined;
  state(snapshot: Snapshot): void;
}
