import { AudioInput } from "../ai/transcription.client";
import { TranscriptionService } from "../ai/transcription.service";
import { Logger, logContext } from "../config/logger";
import { EntityExtractor } from "../extraction/entity-extractor";
import { GapAnalyzer } from "../gaps/gap-analyzer";
import { SessionEngine, StartSessionResult, SubmitAnswerResult } from "../interviews/session.engine";
import { ProfileBuilder } from "../profiles/profile.builder";
import { ResourceSuggester } from "../recommendations/llm-resource-suggester.service";
import { RecommendationEngine } from "../recommendations/recommendation.engine";
import { CoachError } from "../shared/errors";
import { CandidateProfile, GapEntry, JobRequirement } from "../shared/types/profile.types";
import { Recommendation } from "../shared/types/recommendation.types";
import { InterviewSession, SessionSummary } from "../shared/types/session.types";

export interface DocumentInput {
  content: Buffer;
  format: string;
}

export interface DocumentAnalysis {
  profile: CandidateProfile;
  requirement: JobRequirement;
  gaps: GapEntry[];
}

export interface StartCoachSessionInput {
  type: string;
  resume?: DocumentInput;
  jobDescription?: DocumentInput;
  candidate?: CandidateProfile;
  requirement?: JobRequirement;
  timeoutMs?: number;
  technicalStack?: ReadonlyArray<string>;
}

export interface VoiceAnswerResult {
  transcript: string;
  result: SubmitAnswerResult;
}

export interface SessionReport {
  summary: SessionSummary;
  gaps: GapEntry[];
  recommendations: Recommendation[];
}

export interface CoachCapabilities {
  transcription: boolean;
  resourceSuggestions: boolean;
  activeSessions: number;
}

export interface InterviewCoachDeps {
  entityExtractor: EntityExtractor;
  profileBuilder: ProfileBuilder;
  gapAnalyzer: GapAnalyzer;
  sessionEngine: SessionEngine;
  recommendationEngine: RecommendationEngine;
  resourceSuggester?: ResourceSuggester;
  transcriptionService: TranscriptionService;
  logger: Logger;
}

export class InterviewCoachService {
  constructor(private readonly deps: InterviewCoachDeps) {}

  async analyzeDocuments(resume: DocumentInput, jobDescription: DocumentInput): Promise<DocumentAnalysis> {
    const [resumeEntities, jobEntities] = await Promise.all([
      this.deps.entityExtractor.extract(resume.content, resume.format),
      this.deps.entityExtractor.extract(jobDescription.content, jobDescription.format),
    ]);
    const profile = this.deps.profileBuilder.buildCandidateProfile(resumeEntities);
    const requirement = this.deps.profileBuilder.buildJobRequirement(jobEntities);
    const gaps = this.deps.gapAnalyzer.analyze(profile, requirement);

    this.deps.logger.info("documents.analyzed", {
      candidateSkills: profile.skills.length,
      requiredSkills: requirement.requiredSkills.length,
      missingSkills: gaps.filter((gap) => !gap.candidateHasSkill).length,
    });
    return { profile, requirement, gaps };
  }

  async startSession(input: StartCoachSessionInput): Promise<StartSessionResult> {
    let candidate = input.candidate;
    let requirement = input.requirement;
    if (!candidate || !requirement) {
      if (!input.resume || !input.jobDescription) {
        throw new CoachError(
          "InvalidConfiguration",
          "Provide a résumé and a job description, or a prepared candidate profile and job requirement.",
        );
      }
      const analysis = await this.analyzeDocuments(input.resume, input.jobDescription);
      candidate = analysis.profile;
      requirement = analysis.requirement;
    }
    const technicalStack = input.technicalStack?.length
      ? this.deps.profileBuilder.buildTechnicalStack(input.technicalStack)
      : [];
    return this.deps.sessionEngine.start({
      type: input.type,
      candidate,
      requirement,
      ...(input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}),
      ...(technicalStack.length ? { technicalStack } : {}),
    });
  }

  submitAnswer(sessionId: string, questionId: string, text: string): Promise<SubmitAnswerResult> {
    return this.deps.sessionEngine.submitAnswer(sessionId, questionId, text, "text");
  }

  async submitVoiceAnswer(
    sessionId: string,
    questionId: string,
    audio: Buffer,
    input?: AudioInput,
  ): Promise<VoiceAnswerResult> {
    // Fail on state or ordering before spending a transcription call.
    const session = this.deps.sessionEngine.getSession(sessionId);
    if (session.state === "AwaitingAnswer" && session.questions[session.currentIndex]?.id === questionId) {
      const transcript = await this.deps.transcriptionService.transcribe(audio, input);
      logContext(this.deps.logger, "info", "answer.voice.transcribed", {
        session_id: sessionId,
        question_id: questionId,
      }, { chars: transcript.length });
      const result = await this.deps.sessionEngine.submitAnswer(sessionId, questionId, transcript, "voice");
      return { transcript, result };
    }
    const result = await this.deps.sessionEngine.submitAnswer(sessionId, questionId, "", "voice");
    return { transcript: "", result };
  }

  abort(sessionId: string, reason: string): Promise<InterviewSession> {
    return this.deps.sessionEngine.abort(sessionId, reason);
  }

  getSession(sessionId: string): InterviewSession {
    return this.deps.sessionEngine.getSession(sessionId);
  }

  async buildReport(sessionId: string): Promise<SessionReport> {
    const summary = this.deps.sessionEngine.finalize(sessionId);
    const gaps = this.deps.sessionEngine.getGaps(sessionId);
    const suggested = this.deps.resourceSuggester ? await this.deps.resourceSuggester.suggest(gaps, summary) : [];
    const recommendations = this.deps.recommendationEngine.recommend(gaps, summary, suggested);
    logContext(this.deps.logger, "info", "session.report.built", {
      session_id: sessionId,
      interview_type: summary.interviewType,
    }, {
      meanScore: summary.meanScore,
      weakAreas: summary.weakAreas.length,
      suggestedResources: suggested.length,
      recommendations: recommendations.length,
    });
    return { summary, gaps, recommendations };
  }

  // Drops a completed or aborted session before its retention period ends.
  releaseSession(sessionId: string): void {
    this.deps.sessionEngine.release(sessionId);
  }

  capabilities(): CoachCapabilities {
    return {
      transcription: this.deps.transcriptionService.isAvailable(),
      resourceSuggestions: Boolean(this.deps.resourceSuggester),
      activeSessions: this.deps.sessionEngine.sessionCount(),
    };
  }

  dispose(): void {
    this.deps.sessionEngine.dispose();
  }
}
