import { InterviewType } from "../../../shared/types/session.types";

export const RESOURCE_SUGGESTIONS_V1_PROMPT = `Suggest learning resources for a candidate after a mock interview.

Input JSON:
{
  "interview_type": "technical | behavioral | competency | general",
  "focus_skills": ["string"],
  "needs_interview_practice": boolean
}

Output STRICT JSON:
{
  "resources": [{ "title": "string", "url": "string | null", "skill": "string | null", "category": "skill-development | interview-prep | additional" }]
}

Rules:
- At most 2 resources per focus skill.
- skill must be copied verbatim from focus_skills, or be null for general interview practice.
- Add interview-prep resources with skill null only when needs_interview_practice is true.
- Prefer official documentation, well-known courses and books.
- url must be a full https URL you are confident exists, otherwise null.`;

export function buildResourceSuggestionsV1Prompt(input: {
  interviewType: InterviewType;
  focusSkills: ReadonlyArray<string>;
  needsInterviewPractice: boolean;
}): string {
  return [
    RESOURCE_SUGGESTIONS_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        interview_type: input.interviewType,
        focus_skills: input.focusSkills,
        needs_interview_practice: input.needsInterviewPractice,
      },
      null,
      2,
    ),
  ].join("\n");
}
