export const FOLLOW_UP_V1_PROMPT = `Write one follow-up question for a mock interview.

Input JSON:
{
  "interview_type": "technical | behavioral | competency | general",
  "question": "string",
  "answer": "string",
  "target_skill": "string | null",
  "weaknesses": ["string"],
  "prior_exchanges": [{ "question": "string", "answer": "string", "score": number }]
}

Output STRICT JSON:
{
  "text": "string"
}

Rules:
- Ask about the gap named first in weaknesses, or go one level deeper when weaknesses is empty.
- Stay on target_skill when it is set.
- Do not ask something prior_exchanges already covered.
- One question, at most two sentences, no preamble.`;

export function buildFollowUpV1Prompt(input: {
  interviewType: string;
  question: string;
  answer: string;
  targetSkill: string | null;
  weaknesses: ReadonlyArray<string>;
  priorExchanges: ReadonlyArray<{ question: string; answer: string; score: number | null }>;
}): string {
  return [
    FOLLOW_UP_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        interview_type: input.interviewType,
        question: input.question,
        answer: input.answer,
        target_skill: input.targetSkill,
        weaknesses: input.weaknesses.slice(0, 4),
        prior_exchanges: input.priorExchanges.slice(-5),
      },
      null,
      2,
    ),
  ].join("\n");
}
