/**
 * Bootstrap state machine.
 *
 *   privilege_gate --elevated------> elevated_entry
 *   privilege_gate --not elevated--> running_as_user   (terminal)
 *   elevated_entry --owner is root-> running_as_root   (terminal)
 *   elevated_entry --otherwise-----> reexec            (leaves this process)
 *
 * `reexec` always targets the directory owner's non-zero uid, so the next
 * process in the chain leaves the gate on the `not elevated` edge.
 */

import type { DirectoryOwner, ProcessIdentity } from "./types.js";
import { isElevated } from "./privilege.js";
import { ROOT_UID } from "./constants.js";

export type BootstrapState =
  | "privilege_gate"
  | "elevated_entry"
  | "running_as_root"
  | "running_as_user"
  | "reexec";

export type TerminalState = "running_as_root" | "running_as_user" | "reexec";

export type StateFacts = {
  identity: ProcessIdentity;
  cwdOwner: DirectoryOwner;
};

export function isTerminal(state: BootstrapState): state is TerminalState {
  return state === "running_as_root" || state === "running_as_user" || state === "reexec";
}

/** Single transition; terminal states map to themselves */
export function nextState(state: BootstrapState, facts: StateFacts): BootstrapState {
  switch (state) {
    case "privilege_gate":
      return isElevated(facts.identity) ? "elevated_entry" : "running_as_user";
    case "elevated_entry":
      return facts.cwdOwner.uid === ROOT_UID ? "running_as_root" : "reexec";
    case "running_as_root":
    case "running_as_user":
    case "reexec":
      return state;
  }
}

/** Follow transitions from the gate to a terminal state */
export function resolveState(facts: StateFacts): TerminalState {
  let state: BootstrapState = "privilege_gate";
  while (!isTerminal(state)) state = nextState(state, facts);
  return state;
}
