export const ANSWER_EVALUATOR_V1_PROMPT = `Evaluate one mock interview answer.

Input JSON:
{
  "question": "string",
  "target_skill": "string | null",
  "candidate_claims_skill": boolean,
  "candidate_experience_years": number,
  "answer": "string"
}

Output STRICT JSON:
{
  "score": number,
  "strengths": ["string"],
  "weaknesses": ["string"],
  "detailed_feedback": "string",
  "suggestions": ["string"],
  "quick_tips": ["string"]
}

Scoring rules:
- score is between 0 and 1.
- Reward answers that address the question directly and give concrete, specific evidence.
- More on-topic, specific content never lowers the score.
- If the candidate claims the target skill, expect depth that matches the claimed experience.
- strengths and weaknesses are short phrases, at most 4 each, possibly empty.
- detailed_feedback is 2-4 sentences quoting what the answer did and did not cover.
- suggestions are concrete changes to this answer, at most 4.
- quick_tips are short, reusable interview habits, at most 4.

Output constraints:
- Return JSON only.
- No markdown.
- No extra text.`;

export function buildAnswerEvaluatorV1Prompt(input: {
  question: string;
  targetSkill: string | null;
  candidateClaimsSkill: boolean;
  experienceYears: number;
  answer: string;
}): string {
  return [
    ANSWER_EVALUATOR_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        question: input.question,
        target_skill: input.targetSkill,
        candidate_claims_skill: input.candidateClaimsSkill,
        candidate_experience_years: input.experienceYears,
        answer: input.answer,
      },
      null,
      2,
    ),
  ].join("\n");
}
