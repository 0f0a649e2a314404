/**
 * Command lifecycle state machine.
 *
 * Formalizes the states a command can be in and the allowed transitions
 * between them. The dispatcher consults this table before every state
 * change, so a duplicate or late ack can never move a command out of a
 * terminal state.
 *
 * State diagram:
 *   pending -> sent -> acked
 *      \         \---> failed     (device reported failure, cancelled, removed, channel error)
 *       \         \--> timed_out  (deadline expired)
 *        +-> failed               (cancelled or removed before delivery, channel error)
 *
 *   acked, failed, timed_out -> (terminal)
 */

import type { CommandState } from "@fleetdeck/shared";

/**
 * Allowed transitions for each command state.
 *
 *   pending   -> [sent, failed]
 *   sent      -> [acked, failed, timed_out]
 *   acked     -> []   (terminal)
 *   failed    -> []   (terminal)
 *   timed_out -> []   (terminal)
 */
export const TRANSITIONS: Record<CommandState, readonly CommandState[]> = {
  pending: ["sent", "failed"],
  sent: ["acked", "failed", "timed_out"],
  acked: [],
  failed: [],
  timed_out: [],
};

/**
 * Check whether moving a command from `from` to `to` is a legal transition.
 */
export function isValidTransition(from: CommandState, to: CommandState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Whether a command in this state will never change again */
export function isTerminal(state: CommandState): boolean {
  return TRANSITIONS[state].length === 0;
}

/** Whether a command in this state still occupies its (device, kind) slot */
export function isActive(state: CommandState): boolean {
  return state === "pending" || state === "sent";
}
