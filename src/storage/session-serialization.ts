import { isUsableQuestionId } from "../interviews/question-plan.guard";
import { CoachError } from "../shared/errors";
import {
  Answer,
  AnswerFeedback,
  AnswerInputType,
  Evaluation,
  INTERVIEW_TYPES,
  InterviewSession,
  InterviewType,
  Question,
  SessionState,
} from "../shared/types/session.types";
import { Skill, SkillCategory } from "../shared/types/skill.types";

const SESSION_STATES: ReadonlyArray<SessionState> = ["Created", "AwaitingAnswer", "Evaluating", "Completed", "Aborted"];
const SKILL_CATEGORIES: ReadonlyArray<SkillCategory> = ["technical", "behavioral", "domain"];

export function serializeSession(session: InterviewSession): string {
  return JSON.stringify(
    {
      id: session.id,
      interviewType: session.interviewType,
      state: session.state,
      currentIndex: session.currentIndex,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      abortReason: session.abortReason ?? null,
      questions: session.questions.map((question) => ({
        id: question.id,
        text: question.text,
        type: question.type,
        targetSkill: question.targetSkill ?? null,
        followUpOf: question.followUpOf ?? null,
      })),
      answers: session.answers,
    },
    null,
    2,
  );
}

export function cloneSession(session: InterviewSession): InterviewSession {
  return deserializeSession(JSON.parse(serializeSession(session)));
}

export function deserializeSession(raw: unknown): InterviewSession {
  if (!isRecord(raw)) {
    throw invalid("Session snapshot must be an object.");
  }
  const id = requireString(raw.id, "id");
  const interviewType = INTERVIEW_TYPES.find((type) => type === raw.interviewType);
  const state = SESSION_STATES.find((item) => item === raw.state);
  if (!interviewType) {
    throw invalid(`Session ${id} has invalid interviewType: ${String(raw.interviewType)}`);
  }
  if (!state) {
    throw invalid(`Session ${id} has invalid state: ${String(raw.state)}`);
  }
  if (!Array.isArray(raw.questions)) {
    throw invalid(`Session ${id} has no questions array.`);
  }
  const questions = raw.questions.map((item) => parseQuestion(item, interviewType));
  const currentIndex = raw.currentIndex;
  if (typeof currentIndex !== "number" || !Number.isInteger(currentIndex) || currentIndex < 0 || currentIndex > questions.length) {
    throw invalid(`Session ${id} has currentIndex outside its question list.`);
  }

  const answers: Record<string, Answer> = {};
  const questionIds = new Set(questions.map((question) => question.id));
  const rawAnswers = isRecord(raw.answers) ? raw.answers : {};
  for (const [questionId, value] of Object.entries(rawAnswers)) {
    if (!questionIds.has(questionId)) {
      throw invalid(`Session ${id} has an answer for unknown question ${questionId}.`);
    }
    answers[questionId] = parseAnswer(value, questionId);
  }

  const session: InterviewSession = {
    id,
    interviewType,
    state,
    questions,
    answers,
    currentIndex,
    createdAt: requireString(raw.createdAt, "createdAt"),
    updatedAt: requireString(raw.updatedAt, "updatedAt"),
  };
  if (typeof raw.abortReason === "string") {
    session.abortReason = raw.abortReason;
  }
  return session;
}

function parseQuestion(raw: unknown, fallbackType: InterviewType): Question {
  if (!isRecord(raw)) {
    throw invalid("Question must be an object.");
  }
  const type = INTERVIEW_TYPES.find((item) => item === raw.type) ?? fallbackType;
  const targetSkill = raw.targetSkill === null || raw.targetSkill === undefined ? undefined : parseSkill(raw.targetSkill);
  const id = requireString(raw.id, "question.id");
  if (!isUsableQuestionId(id)) {
    throw invalid(`Question id is reserved: ${id}`);
  }
  return {
    id,
    text: requireString(raw.text, "question.text"),
    type,
    ...(targetSkill ? { targetSkill } : {}),
    ...(typeof raw.followUpOf === "string" ? { followUpOf: raw.followUpOf } : {}),
  };
}

function parseSkill(raw: unknown): Skill {
  if (!isRecord(raw)) {
    throw invalid("Skill must be an object.");
  }
  const category = SKILL_CATEGORIES.find((item) => item === raw.category);
  if (!category) {
    throw invalid(`Skill has invalid category: ${String(raw.category)}`);
  }
  return {
    canonicalName: requireString(raw.canonicalName, "skill.canonicalName"),
    aliases: Array.isArray(raw.aliases) ? raw.aliases.filter((alias): alias is string => typeof alias === "string") : [],
    category,
  };
}

function parseAnswer(raw: unknown, questionId: string): Answer {
  if (!isRecord(raw)) {
    throw invalid(`Answer for ${questionId} must be an object.`);
  }
  const inputType: AnswerInputType = raw.inputType === "voice" ? "voice" : "text";
  const evaluation = raw.evaluation === undefined || raw.evaluation === null ? undefined : parseEvaluation(raw.evaluation);
  return {
    questionId,
    rawText: typeof raw.rawText === "string" ? raw.rawText : "",
    inputType,
    ...(evaluation ? { evaluation } : {}),
  };
}

function parseEvaluation(raw: unknown): Evaluation {
  if (!isRecord(raw) || typeof raw.score !== "number" || raw.score < 0 || raw.score > 1) {
    throw invalid("Evaluation must carry a score between 0 and 1.");
  }
  const feedback = isRecord(raw.feedback) ? parseFeedback(raw.feedback) : undefined;
  return {
    score: raw.score,
    strengths: toStrings(raw.strengths),
    weaknesses: toStrings(raw.weaknesses),
    ...(feedback ? { feedback } : {}),
  };
}

function parseFeedback(raw: Record<string, unknown>): AnswerFeedback {
  return {
    detailedFeedback: typeof raw.detailedFeedback === "string" ? raw.detailedFeedback : "",
    suggestions: toStrings(raw.suggestions),
    quickTips: toStrings(raw.quickTips),
  };
}

function toStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw invalid(`Session snapshot field ${field} must be a non-empty string.`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string): CoachError {
  return new CoachError("InvalidConfiguration", message);
}
