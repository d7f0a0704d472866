import { LlmClient, StructuredJsonClient } from "../ai/llm.client";
import { AudioTranscriber, TranscriptionClient } from "../ai/transcription.client";
import { TranscriptionService } from "../ai/transcription.service";
import { EnvConfig } from "../config/env";
import { Logger } from "../config/logger";
import { DocumentService } from "../documents/document.service";
import { DocumentEntityExtractor } from "../extraction/entity-extractor";
import { GapAnalyzer } from "../gaps/gap-analyzer";
import { AnswerEvaluator, HeuristicAnswerEvaluator } from "../interviews/answer-evaluator";
import { AnswerEvaluatorService } from "../interviews/answer-evaluator.service";
import { LlmQuestionGeneratorService } from "../interviews/llm-question-generator.service";
import { QuestionGenerator, TemplateQuestionGenerator } from "../interviews/question-generator";
import { SessionEngine } from "../interviews/session.engine";
import { ProfileBuilder } from "../profiles/profile.builder";
import { LlmResourceSuggesterService } from "../recommendations/llm-resource-suggester.service";
import { RecommendationEngine } from "../recommendations/recommendation.engine";
import { ResourceCatalog } from "../shared/types/recommendation.types";
import { SkillVocabulary } from "../shared/types/skill.types";
import { SkillNormalizer } from "../skills/skill-normalizer";
import { SessionArchive, SessionStorageService } from "../storage/session-storage.service";
import { InterviewCoachService } from "./interview-coach.service";

export interface CoachAssets {
  vocabulary: SkillVocabulary;
  catalog: ResourceCatalog;
}

export interface CoachOverrides {
  llmClient?: StructuredJsonClient | null;
  transcriber?: AudioTranscriber | null;
  storage?: SessionArchive | null;
  idFactory?: () => string;
  clock?: () => Date;
}

export function createCoach(
  env: EnvConfig,
  assets: CoachAssets,
  logger: Logger,
  overrides: CoachOverrides = {},
): InterviewCoachService {
  const policy = env.policy;
  const llmClient =
    overrides.llmClient !== undefined
      ? overrides.llmClient
      : env.openaiApiKey
        ? new LlmClient(env.openaiApiKey, logger, env.openaiChatModel)
        : null;
  const transcriber =
    overrides.transcriber !== undefined
      ? overrides.transcriber
      : env.openaiApiKey
        ? new TranscriptionClient(env.openaiApiKey, logger, env.openaiTranscriptionModel)
        : null;
  const storage =
    overrides.storage !== undefined ? overrides.storage : new SessionStorageService(env.sessionStorageDir, logger);

  const templateGenerator = new TemplateQuestionGenerator(policy.questionSeed);
  const heuristicEvaluator = new HeuristicAnswerEvaluator();
  const questionGenerator: QuestionGenerator = llmClient
    ? new LlmQuestionGeneratorService(llmClient, templateGenerator, logger)
    : templateGenerator;
  const answerEvaluator: AnswerEvaluator = llmClient
    ? new AnswerEvaluatorService(llmClient, heuristicEvaluator, logger)
    : heuristicEvaluator;

  logger.info("coach.capabilities", {
    llm: Boolean(llmClient),
    modelName: llmClient?.getModelName?.() ?? null,
    transcription: Boolean(transcriber),
    resourceSuggestions: Boolean(llmClient),
    storage: Boolean(storage),
    adaptiveFollowUps: policy.adaptiveFollowUps,
  });

  const normalizer = new SkillNormalizer(assets.vocabulary, logger);
  const gapAnalyzer = new GapAnalyzer({ weights: policy.importanceWeights });
  const sessionEngine = new SessionEngine({
    questionGenerator,
    answerEvaluator,
    gapAnalyzer,
    policy,
    logger,
    ...(storage ? { storage } : {}),
    ...(overrides.idFactory ? { idFactory: overrides.idFactory } : {}),
    ...(overrides.clock ? { clock: overrides.clock } : {}),
  });

  return new InterviewCoachService({
    entityExtractor: new DocumentEntityExtractor(new DocumentService(logger), assets.vocabulary, logger),
    profileBuilder: new ProfileBuilder(normalizer, logger),
    gapAnalyzer,
    sessionEngine,
    recommendationEngine: new RecommendationEngine({
      catalog: assets.catalog,
      weights: policy.recommendationWeights,
      priorityCutoff: policy.priorityCutoff,
      logger,
    }),
    ...(llmClient ? { resourceSuggester: new LlmResourceSuggesterService(llmClient, logger) } : {}),
    transcriptionService: new TranscriptionService(transcriber, logger),
    logger,
  });
}
