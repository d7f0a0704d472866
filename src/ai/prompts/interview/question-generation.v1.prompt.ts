import { InterviewType } from "../../../shared/types/session.types";

const TYPE_RULES: Record<InterviewType, string> = {
  technical: [
    "- Test practical problem solving with the listed skills.",
    "- Include at least one system design or architecture question when skills allow it.",
    "- Prioritise the skills the candidate is missing, then test claimed skills.",
  ].join("\n"),
  behavioral: [
    "- Ask for past situations answerable in STAR form.",
    "- Cover teamwork, leadership, conflict resolution and problem solving.",
  ].join("\n"),
  competency: [
    "- Each question targets one competency the role requires.",
    "- Ask for measurable evidence: scope, decisions, outcomes.",
    "- Cover delivery, stakeholder communication and decision making.",
  ].join("\n"),
  general: [
    "- Cover motivation, work style and career goals.",
    "- Keep questions open-ended but specific to this role.",
  ].join("\n"),
};

export const QUESTION_GENERATION_V1_PROMPT = `Generate mock interview questions.

Input JSON:
{
  "interview_type": "technical | behavioral | competency | general",
  "question_count": number,
  "target_skills": [{ "skill": "string", "importance": "must-have | nice-to-have", "candidate_has_skill": boolean }],
  "responsibilities": ["string"],
  "technical_stack": ["string"],
  "prior_answers": [{ "question": "string", "answer": "string" }]
}

Output STRICT JSON:
{
  "questions": [{ "text": "string", "target_skill": "string | null" }]
}

Rules:
- Return exactly question_count questions.
- target_skill must be copied verbatim from target_skills or be null.
- Do not repeat a question from prior_answers.
- For technical interviews, cover the technical_stack skills the candidate asked to practise.`;

export function buildQuestionGenerationV1Prompt(input: {
  interviewType: InterviewType;
  questionCount: number;
  targetSkills: ReadonlyArray<{ skill: string; importance: string; candidateHasSkill: boolean }>;
  responsibilities: ReadonlyArray<string>;
  technicalStack: ReadonlyArray<string>;
  priorAnswers: ReadonlyArray<{ question: string; answer: string }>;
}): string {
  return [
    QUESTION_GENERATION_V1_PROMPT,
    "",
    `Rules for ${input.interviewType} interviews:`,
    TYPE_RULES[input.interviewType],
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        interview_type: input.interviewType,
        question_count: input.questionCount,
        target_skills: input.targetSkills.map((item) => ({
          skill: item.skill,
          importance: item.importance,
          candidate_has_skill: item.candidateHasSkill,
        })),
        responsibilities: input.responsibilities.slice(0, 8),
        technical_stack: input.technicalStack.slice(0, 10),
        prior_answers: input.priorAnswers.slice(-5),
      },
      null,
      2,
    ),
  ].join("\n");
}
