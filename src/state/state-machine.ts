import { CoachError } from "../shared/errors";
import { SessionState } from "../shared/types/session.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: SessionState, to: SessionState): void {
  if (!isAllowedTransition(from, to)) {
    throw new CoachError("InvalidState", `Invalid transition from ${from} to ${to}`, { from, to });
  }
}
