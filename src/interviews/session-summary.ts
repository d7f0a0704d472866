import {
  InterviewSession,
  QuestionScore,
  SessionSummary,
  WeakArea,
} from "../shared/types/session.types";

export const GENERAL_AREA_LABEL = "general";

export function summarizeSession(session: InterviewSession, weakAreaThreshold: number): SessionSummary {
  const questionScores: QuestionScore[] = [];
  for (const question of session.questions) {
    const evaluation = session.answers[question.id]?.evaluation;
    if (!evaluation) {
      continue;
    }
    questionScores.push(
      Object.freeze({
        questionId: question.id,
        score: evaluation.score,
        ...(question.targetSkill ? { targetSkill: question.targetSkill } : {}),
      }),
    );
  }

  const total = questionScores.reduce((sum, item) => sum + item.score, 0);
  const meanScore = questionScores.length ? round4(total / questionScores.length) : 0;

  return Object.freeze({
    sessionId: session.id,
    interviewType: session.interviewType,
    questionCount: session.questions.length,
    meanScore,
    questionScores: Object.freeze(questionScores),
    weakAreas: Object.freeze(rankWeakAreas(questionScores, weakAreaThreshold)),
  });
}

/**
 * Groups question scores by target skill and keeps the groups whose lowest score is
 * under the threshold, weakest first. Questions without a target skill share one
 * "general" group.
 */
export function rankWeakAreas(scores: ReadonlyArray<QuestionScore>, threshold: number): WeakArea[] {
  const groups = new Map<string, { area: WeakArea; order: number }>();
  for (const item of scores) {
    const key = item.targetSkill ? `skill:${item.targetSkill.canonicalName}` : GENERAL_AREA_LABEL;
    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, {
        order: groups.size,
        area: {
          label: item.targetSkill?.canonicalName ?? GENERAL_AREA_LABEL,
          lowestScore: item.score,
          questionIds: [item.questionId],
          ...(item.targetSkill ? { skill: item.targetSkill } : {}),
        },
      });
      continue;
    }
    existing.area = {
      ...existing.area,
      lowestScore: Math.min(existing.area.lowestScore, item.score),
      questionIds: [...existing.area.questionIds, item.questionId],
    };
  }

  return Array.from(groups.values())
    .filter((group) => group.area.lowestScore < threshold)
    .sort((a, b) => a.area.lowestScore - b.area.lowestScore || a.order - b.order)
    .map((group) => Object.freeze(group.area));
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
