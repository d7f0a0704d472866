import { Skill } from "./skill.types";

export type InterviewType = "technical" | "behavioral" | "competency" | "general";

export const INTERVIEW_TYPES: ReadonlyArray<InterviewType> = [
  "technical",
  "behavioral",
  "competency",
  "general",
];

export type SessionState = "Created" | "AwaitingAnswer" | "Evaluating" | "Completed" | "Aborted";

export type AnswerInputType = "text" | "voice";

export interface Question {
  readonly id: string;
  readonly text: string;
  readonly type: InterviewType;
  readonly targetSkill?: Skill;
  readonly followUpOf?: string;
}

export interface AnswerFeedback {
  readonly detailedFeedback: string;
  readonly suggestions: ReadonlyArray<string>;
  readonly quickTips: ReadonlyArray<string>;
}

export interface Evaluation {
  readonly score: number;
  readonly strengths: ReadonlyArray<string>;
  readonly weaknesses: ReadonlyArray<string>;
  readonly feedback?: AnswerFeedback;
}

export interface Answer {
  readonly questionId: string;
  readonly rawText: string;
  readonly inputType: AnswerInputType;
  readonly evaluation?: Evaluation;
}

export interface InterviewSession {
  id: string;
  interviewType: InterviewType;
  state: SessionState;
  questions: Question[];
  answers: Record<string, Answer>;
  currentIndex: number;
  createdAt: string;
  updatedAt: string;
  abortReason?: string;
}

export interface QuestionScore {
  readonly questionId: string;
  readonly targetSkill?: Skill;
  readonly score: number;
}

export interface WeakArea {
  readonly skill?: Skill;
  readonly label: string;
  readonly lowestScore: number;
  readonly questionIds: ReadonlyArray<string>;
}

export interface SessionSummary {
  readonly sessionId: string;
  readonly interviewType: InterviewType;
  readonly questionCount: number;
  readonly meanScore: number;
  readonly questionScores: ReadonlyArray<QuestionScore>;
  readonly weakAreas: ReadonlyArray<WeakArea>;
}
