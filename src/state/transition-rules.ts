import { SessionState } from "../shared/types/session.types";

const transitionRules: Record<SessionState, SessionState[]> = {
  Created: ["AwaitingAnswer", "Aborted"],
  AwaitingAnswer: ["Evaluating", "Aborted"],
  Evaluating: ["AwaitingAnswer", "Completed", "Aborted"],
  Completed: [],
  Aborted: [],
};

export function isAllowedTransition(from: SessionState, to: SessionState): boolean {
  return transitionRules[from].includes(to);
}

export function isTerminalState(state: SessionState): boolean {
  return transitionRules[state].length === 0;
}
