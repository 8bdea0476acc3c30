import type { ProcessIdentity } from "./types.js";
import { ROOT_UID } from "./constants.js";

/** Whether the process runs with administrative rights */
export function isElevated(identity: ProcessIdentity): boolean {
  return identity.uid === ROOT_UID;
}
