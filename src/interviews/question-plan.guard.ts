import { CoachError } from "../shared/errors";
import { InterviewType, Question } from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";

export const MAX_INTERVIEW_QUESTIONS = 10;

// Question ids become keys of the session's answer map.
const RESERVED_QUESTION_IDS = new Set(["__proto__", "constructor", "prototype"]);

interface QuestionDraft {
  text: string;
  targetSkill?: Skill;
}

export function fallbackQuestionByType(type: InterviewType): string {
  if (type === "technical" || type === "competency") {
    return "Can you walk me through the most technically demanding project on your résumé?";
  }
  return "Can you briefly walk me through your background and what you are looking for next?";
}

export function buildQuestionSequence(
  type: InterviewType,
  drafts: ReadonlyArray<QuestionDraft>,
  maxQuestions: number,
): Question[] {
  const seenTexts = new Set<string>();
  const questions: Question[] = [];
  for (const draft of drafts) {
    const text = normalizeQuestionText(draft.text);
    const key = text.toLowerCase();
    if (!text || seenTexts.has(key)) {
      continue;
    }
    seenTexts.add(key);
    questions.push(
      freezeQuestion({
        id: `q${questions.length + 1}`,
        text,
        type,
        ...(draft.targetSkill ? { targetSkill: draft.targetSkill } : {}),
      }),
    );
    if (questions.length >= Math.min(maxQuestions, MAX_INTERVIEW_QUESTIONS)) {
      break;
    }
  }
  return questions;
}

export function assertQuestionSequence(questions: ReadonlyArray<Question>): void {
  if (!questions.length) {
    throw new CoachError("InsufficientContext", "Question generator returned no questions.");
  }
  const ids = new Set<string>();
  for (const question of questions) {
    if (!question.id.trim() || !question.text.trim()) {
      throw new CoachError("InvalidConfiguration", "Generated question is missing an id or text.");
    }
    if (!isUsableQuestionId(question.id)) {
      throw new CoachError("InvalidConfiguration", `Reserved question id: ${question.id}`);
    }
    if (ids.has(question.id)) {
      throw new CoachError("InvalidConfiguration", `Duplicate question id: ${question.id}`);
    }
    ids.add(question.id);
  }
}

export function isUsableQuestionId(id: string): boolean {
  return id.trim().length > 0 && !RESERVED_QUESTION_IDS.has(id.trim());
}

export function freezeQuestion(question: Question): Question {
  return Object.freeze({ ...question });
}

function normalizeQuestionText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
