import { InterviewType } from "../shared/types/session.types";

export const MISSING_SKILL_TEMPLATES: ReadonlyArray<string> = [
  "This role relies on {skill}. How would you get productive with it in your first month, and what do you already know that transfers?",
  "Suppose you had to deliver a feature built on {skill} next sprint. Walk me through how you would approach it.",
  "What do you understand about {skill}, and where have you come closest to using it?",
];

export const HELD_SKILL_TEMPLATES: ReadonlyArray<string> = [
  "Describe a project where you used {skill}. What did you personally build and what trade-offs did you make?",
  "What is the hardest problem you solved with {skill}, and how did you debug it?",
  "How would you explain a key design decision you made with {skill} to a new teammate?",
];

export const COMPETENCY_SKILL_TEMPLATES: ReadonlyArray<string> = [
  "Give me a measurable example of how you applied {skill}. What was the scope and what was the outcome?",
  "Tell me about a decision you made that depended on {skill}. What evidence did you use?",
];

export const BEHAVIORAL_SKILL_TEMPLATES: ReadonlyArray<string> = [
  "Tell me about a time your {skill} made a difference to the outcome. What was the situation and what did you do?",
  "Describe a situation where your {skill} was tested. How did you handle it and what was the result?",
];

export const RESPONSIBILITY_TEMPLATE = "This role involves: \"{responsibility}\". How have you handled similar work before?";

export const GENERIC_TEMPLATES: Record<InterviewType, ReadonlyArray<string>> = {
  technical: [
    "Walk me through the architecture of a system you worked on recently. What would you change today?",
    "How do you approach debugging a production issue you cannot reproduce locally?",
    "How do you decide when code is tested well enough to ship?",
    "Describe a performance problem you found and how you measured the improvement.",
    "How do you keep a codebase maintainable as the team grows?",
  ],
  behavioral: [
    "Tell me about a time you disagreed with a teammate. How did you resolve it?",
    "Describe a situation where you had to deliver under a tight deadline.",
    "Tell me about a mistake you made at work and what you learned from it.",
    "Describe a time you took the lead without being asked.",
    "Tell me about feedback that changed how you work.",
  ],
  competency: [
    "Describe a project you delivered end to end. How did you plan and track it?",
    "Tell me about a time you had to align stakeholders with conflicting priorities.",
    "Give an example of a decision you made with incomplete information.",
    "How have you measured the impact of your work?",
    "Describe how you broke down a large, ambiguous problem.",
  ],
  general: [
    "What attracts you to this role?",
    "Which parts of your recent work did you enjoy most, and why?",
    "How do you prefer to work with your team day to day?",
    "Where do you want your career to be in three years?",
    "What would make your first six months here a success?",
  ],
};

export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match);
}
