export type FrameState = "unknown" | "array" | "object" | "objattr";

/**
 * Delegated-write sub-state of a frame. `open` while a strategy invoked for
 * this frame still owes exactly one value, `filled` once it has written it.
 */
export type SlotState = "closed" | "open" | "filled";

/**
 * One nesting level of a writer session.
 */
export interface Frame {
  readonly depth: number;
  /** Leading whitespace for members at this depth. */
  readonly indent: string;
  state: FrameState;
  itemCount: number;
  slot: SlotState;
}

export const createFrame = (
  depth: number,
  indent: string,
  state: FrameState
): Frame => ({
  depth,
  indent,
  state,
  itemCount: 0,
  slot: "closed",
});
