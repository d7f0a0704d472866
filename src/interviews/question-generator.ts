import { CoachError } from "../shared/errors";
import { GapEntry, JobRequirement } from "../shared/types/profile.types";
import { Answer, Evaluation, InterviewType, Question } from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";
import { createSeededRandom, pickOne, RandomSource, shuffled } from "../shared/utils/seeded-random";
import { buildQuestionSequence, fallbackQuestionByType, freezeQuestion } from "./question-plan.guard";
import {
  BEHAVIORAL_SKILL_TEMPLATES,
  COMPETENCY_SKILL_TEMPLATES,
  GENERIC_TEMPLATES,
  HELD_SKILL_TEMPLATES,
  MISSING_SKILL_TEMPLATES,
  RESPONSIBILITY_TEMPLATE,
  renderTemplate,
} from "./question-templates";

export interface PriorExchange {
  readonly question: Question;
  readonly answer: Answer;
}

export interface QuestionContext {
  readonly type: InterviewType;
  readonly requirement: JobRequirement;
  readonly gaps: ReadonlyArray<GapEntry>;
  readonly priorAnswers: ReadonlyArray<PriorExchange>;
  readonly questionCount: number;
  readonly technicalStack?: ReadonlyArray<Skill>;
}

export interface FollowUpInput {
  readonly question: Question;
  readonly answer: Answer;
  readonly evaluation: Evaluation;
  readonly targetSkill?: Skill;
  // Earlier evaluated exchanges of the same session, oldest first.
  readonly priorExchanges?: ReadonlyArray<PriorExchange>;
}

export interface QuestionGenerator {
  generate(context: QuestionContext): Promise<Question[]>;
  generateFollowUp(input: FollowUpInput): Promise<Question>;
}

interface SkillSeed {
  skill: Skill;
  missing: boolean;
}

export function assertGenerationContext(context: QuestionContext): void {
  const needsSkills = context.type === "technical" || context.type === "competency";
  const hasStack = context.type === "technical" && Boolean(context.technicalStack?.length);
  if (needsSkills && !hasStack && context.requirement.requiredSkills.length === 0 && context.gaps.length === 0) {
    throw new CoachError(
      "InsufficientContext",
      `A ${context.type} interview needs job requirements or skill gaps to generate questions.`,
      { interviewType: context.type },
    );
  }
}

/**
 * Deterministic generator built from fixed templates.
 *
 * Template variants are picked with a seeded PRNG, so the same seed and context
 * always produce the same sequence.
 */
export class TemplateQuestionGenerator implements QuestionGenerator {
  constructor(private readonly seed: number) {}

  async generate(context: QuestionContext): Promise<Question[]> {
    assertGenerationContext(context);
    const random = createSeededRandom(this.seed);
    const askedTexts = new Set(context.priorAnswers.map((item) => item.question.text.toLowerCase()));

    const drafts = [
      ...this.skillDrafts(context, random),
      ...responsibilityDrafts(context),
      ...shuffled(GENERIC_TEMPLATES[context.type], random).map((text) => ({ text })),
    ].filter((draft) => !askedTexts.has(draft.text.toLowerCase()));

    const questions = buildQuestionSequence(context.type, drafts, context.questionCount);
    if (!questions.length) {
      return buildQuestionSequence(context.type, [{ text: fallbackQuestionByType(context.type) }], 1);
    }
    return questions;
  }

  async generateFollowUp(input: FollowUpInput): Promise<Question> {
    const skill = input.targetSkill ?? input.question.targetSkill;
    const missing = input.evaluation.weaknesses[0];
    const focus = missing ? `Your previous answer was missing: ${missing}.` : "Let's go one level deeper.";
    const ask = skill
      ? `Can you give one concrete example of how you used ${skill.canonicalName}, what you did yourself and what the result was?`
      : "Can you give one concrete example, what you did yourself and what the result was?";
    return freezeQuestion({
      id: `${input.question.id}-followup`,
      text: `${focus} ${ask}`,
      type: input.question.type,
      followUpOf: input.question.id,
      ...(skill ? { targetSkill: skill } : {}),
    });
  }

  private skillDrafts(context: QuestionContext, random: RandomSource): Array<{ text: string; targetSkill: Skill }> {
    return collectSkillSeeds(context).flatMap((seed) => {
      const template = pickOne(templatesFor(context.type, seed), random);
      if (!template) {
        return [];
      }
      return [{ text: renderTemplate(template, { skill: seed.skill.canonicalName }), targetSkill: seed.skill }];
    });
  }
}

export function collectSkillSeeds(context: QuestionContext): SkillSeed[] {
  if (context.type === "behavioral") {
    return context.requirement.requiredSkills
      .filter((item) => item.skill.category === "behavioral")
      .map((item) => ({ skill: item.skill, missing: false }));
  }
  if (context.type === "general") {
    return [];
  }
  const requirementSeeds = context.gaps.length
    ? context.gaps.map((gap) => ({ skill: gap.skill, missing: !gap.candidateHasSkill }))
    : context.requirement.requiredSkills.map((item) => ({ skill: item.skill, missing: true }));
  if (context.type !== "technical" || !context.technicalStack?.length) {
    return requirementSeeds;
  }
  const stackSeeds = context.technicalStack.map((item) => ({ skill: item, missing: false }));
  return interleaveSeeds(requirementSeeds, stackSeeds);
}

// Alternates requirement and stack seeds so both show up early in a short interview.
function interleaveSeeds(first: SkillSeed[], second: SkillSeed[]): SkillSeed[] {
  const seen = new Set<string>();
  const merged: SkillSeed[] = [];
  for (let index = 0; index < Math.max(first.length, second.length); index += 1) {
    for (const seed of [first[index], second[index]]) {
      if (seed && !seen.has(seed.skill.canonicalName)) {
        seen.add(seed.skill.canonicalName);
        merged.push(seed);
      }
    }
  }
  return merged;
}

function templatesFor(type: InterviewType, seed: SkillSeed): ReadonlyArray<string> {
  if (type === "behavioral") {
    return BEHAVIORAL_SKILL_TEMPLATES;
  }
  if (type === "competency") {
    return COMPETENCY_SKILL_TEMPLATES;
  }
  return seed.missing ? MISSING_SKILL_TEMPLATES : HELD_SKILL_TEMPLATES;
}

function responsibilityDrafts(context: QuestionContext): Array<{ text: string }> {
  if (context.type !== "competency" && context.type !== "general") {
    return [];
  }
  return context.requirement.responsibilities
    .slice(0, 2)
    .map((responsibility) => ({ text: renderTemplate(RESPONSIBILITY_TEMPLATE, { responsibility }) }));
}
