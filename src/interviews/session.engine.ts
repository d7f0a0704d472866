import { randomUUID } from "node:crypto";
import { Logger, logContext } from "../config/logger";
import { topGapSeeds, GapAnalyzer } from "../gaps/gap-analyzer";
import { CoachError, describeError, isCoachError } from "../shared/errors";
import { CoachPolicy } from "../shared/types/policy.types";
import { CandidateProfile, GapEntry, JobRequirement } from "../shared/types/profile.types";
import {
  Answer,
  AnswerFeedback,
  AnswerInputType,
  Evaluation,
  INTERVIEW_TYPES,
  InterviewSession,
  InterviewType,
  Question,
  SessionState,
  SessionSummary,
} from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";
import { assertTransition } from "../state/state-machine";
import { isTerminalState } from "../state/transition-rules";
import { SessionArchive } from "../storage/session-storage.service";
import { cloneSession } from "../storage/session-serialization";
import { AnswerEvaluator } from "./answer-evaluator";
import { assertQuestionSequence, freezeQuestion, isUsableQuestionId } from "./question-plan.guard";
import { PriorExchange, QuestionGenerator } from "./question-generator";
import { summarizeSession } from "./session-summary";

export const TIMEOUT_ABORT_REASON = "timeout";

export interface SessionEngineDeps {
  questionGenerator: QuestionGenerator;
  answerEvaluator: AnswerEvaluator;
  gapAnalyzer: GapAnalyzer;
  policy: CoachPolicy;
  logger: Logger;
  storage?: SessionArchive;
  idFactory?: () => string;
  clock?: () => Date;
}

export interface StartSessionInput {
  type: string;
  candidate: CandidateProfile | null | undefined;
  requirement: JobRequirement | null | undefined;
  timeoutMs?: number;
  // Technical interviews only; other types ignore it.
  technicalStack?: ReadonlyArray<Skill>;
}

export interface StartSessionResult {
  session: InterviewSession;
  gaps: GapEntry[];
  currentQuestion: Question;
}

export type SubmitAnswerResult =
  | {
      kind: "next_question";
      session: InterviewSession;
      evaluation: Evaluation;
      nextQuestion: Question;
      followUpInserted: boolean;
      followUpError?: string;
    }
  | {
      kind: "completed";
      session: InterviewSession;
      evaluation: Evaluation;
      followUpError?: string;
    }
  | {
      kind: "discarded";
      session: InterviewSession;
      reason: string;
    };

interface SessionRecord {
  session: InterviewSession;
  profile: CandidateProfile;
  requirement: JobRequirement;
  gaps: GapEntry[];
  // Bumped on abort; async work started under an older epoch is dropped.
  epoch: number;
  // Session timeout while active, eviction once terminal.
  timer?: NodeJS.Timeout;
}

/**
 * Owns every interview session and drives it through the state machine.
 *
 * All mutation goes through this class. Callers get copies from `getSession` and the
 * results of each operation, never the live session object.
 */
export class SessionEngine {
  private readonly records = new Map<string, SessionRecord>();
  private readonly idFactory: () => string;
  private readonly clock: () => Date;

  constructor(private readonly deps: SessionEngineDeps) {
    this.idFactory = deps.idFactory ?? randomUUID;
    this.clock = deps.clock ?? (() => new Date());
  }

  async start(input: StartSessionInput): Promise<StartSessionResult> {
    const type = parseInterviewType(input.type);
    const { candidate, requirement } = input;
    if (!candidate) {
      throw new CoachError("InvalidConfiguration", "A candidate profile is required to start a session.");
    }
    if (!requirement) {
      throw new CoachError("InvalidConfiguration", "A job requirement is required to start a session.");
    }
    const timeoutMs = input.timeoutMs ?? this.deps.policy.sessionTimeoutMs;
    if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
      throw new CoachError("InvalidConfiguration", `Invalid session timeout: ${timeoutMs}`);
    }

    const now = this.now();
    const session: InterviewSession = {
      id: this.idFactory(),
      interviewType: type,
      state: "Created",
      questions: [],
      answers: {},
      currentIndex: 0,
      createdAt: now,
      updatedAt: now,
    };
    if (this.records.has(session.id)) {
      throw new CoachError("InvalidConfiguration", `Session id already in use: ${session.id}`);
    }
    const gaps = this.deps.gapAnalyzer.analyze(candidate, requirement);
    const record: SessionRecord = { session, profile: candidate, requirement, gaps, epoch: 0 };
    this.records.set(session.id, record);
    if (timeoutMs !== undefined) {
      this.armTimeout(record, timeoutMs);
    }

    const seeds = type === "technical" || type === "competency" ? topGapSeeds(gaps, this.deps.policy.gapSeedCount) : [];
    const technicalStack = type === "technical" ? input.technicalStack ?? [] : [];
    const epoch = record.epoch;
    let questions: Question[];
    try {
      questions = await this.deps.questionGenerator.generate({
        type,
        requirement,
        gaps: seeds,
        priorAnswers: [],
        questionCount: this.deps.policy.questionCount,
        ...(technicalStack.length ? { technicalStack } : {}),
      });
      if (record.epoch === epoch) {
        assertQuestionSequence(questions);
      }
    } catch (error) {
      if (record.epoch === epoch) {
        await this.abortRecord(record, isCoachError(error) ? error.code : "question_generation_failed");
      }
      logContext(this.deps.logger, "warn", "session.start.failed", {
        session_id: session.id,
        interview_type: type,
        error_code: isCoachError(error) ? error.code : "unknown",
      }, { error: describeError(error) });
      throw error;
    }

    if (record.epoch !== epoch) {
      throw new CoachError("InvalidState", `Session ${session.id} was aborted while generating questions.`, {
        sessionId: session.id,
        abortReason: session.abortReason,
      });
    }

    session.questions = questions.map((question) => freezeQuestion(question));
    this.transition(record, "AwaitingAnswer");
    logContext(this.deps.logger, "info", "session.started", {
      session_id: session.id,
      interview_type: type,
      current_state: session.state,
    }, { questionCount: session.questions.length, gapCount: gaps.length, stackSize: technicalStack.length });

    return {
      session: cloneSession(session),
      gaps: [...gaps],
      currentQuestion: session.questions[0],
    };
  }

  async submitAnswer(
    sessionId: string,
    questionId: string,
    rawText: string,
    inputType: AnswerInputType = "text",
  ): Promise<SubmitAnswerResult> {
    const record = this.getRecord(sessionId);
    const { session } = record;
    if (session.state !== "AwaitingAnswer") {
      throw new CoachError("InvalidState", `Session ${sessionId} is not awaiting an answer (state: ${session.state}).`, {
        sessionId,
        state: session.state,
      });
    }
    const current = session.questions[session.currentIndex];
    if (!current || current.id !== questionId) {
      throw new CoachError("OutOfOrderSubmission", `Question ${questionId} is not the current question.`, {
        sessionId,
        questionId,
        expectedQuestionId: current?.id,
      });
    }

    const epoch = record.epoch;
    const pending: Answer = Object.freeze({ questionId, rawText, inputType });
    session.answers[questionId] = pending;
    this.transition(record, "Evaluating");

    let evaluation: Evaluation;
    try {
      evaluation = sanitizeEvaluation(await this.deps.answerEvaluator.evaluate(current, pending, record.profile));
    } catch (error) {
      if (record.epoch !== epoch) {
        return this.discarded(record);
      }
      delete session.answers[questionId];
      this.transition(record, "AwaitingAnswer");
      logContext(this.deps.logger, "error", "session.evaluation.failed", {
        session_id: sessionId,
        question_id: questionId,
        current_state: session.state,
      }, { error: describeError(error) });
      throw error;
    }
    if (record.epoch !== epoch) {
      return this.discarded(record);
    }

    const answered: Answer = Object.freeze({ ...pending, evaluation });
    session.answers[questionId] = answered;
    logContext(this.deps.logger, "info", "session.answer.evaluated", {
      session_id: sessionId,
      question_id: questionId,
      interview_type: session.interviewType,
    }, { score: evaluation.score, inputType });

    let followUpError: string | undefined;
    let followUpInserted = false;
    if (this.needsFollowUp(session, current, evaluation)) {
      try {
        const followUp = await this.deps.questionGenerator.generateFollowUp({
          question: current,
          answer: answered,
          evaluation,
          priorExchanges: this.priorExchanges(record).filter((item) => item.question.id !== current.id),
          ...(current.targetSkill ? { targetSkill: current.targetSkill } : {}),
        });
        if (record.epoch !== epoch) {
          return this.discarded(record);
        }
        followUpInserted = this.insertFollowUp(session, current, followUp);
        if (!followUpInserted) {
          followUpError = `Follow-up id ${followUp.id} is empty, reserved or already used.`;
        }
      } catch (error) {
        if (record.epoch !== epoch) {
          return this.discarded(record);
        }
        followUpError = describeError(error);
      }
      if (followUpError) {
        logContext(this.deps.logger, "warn", "session.followup.failed", {
          session_id: sessionId,
          question_id: questionId,
        }, { error: followUpError });
      }
    }

    session.currentIndex += 1;
    if (session.currentIndex >= session.questions.length) {
      this.transition(record, "Completed");
      this.scheduleEviction(record);
      await this.archive(record);
      logContext(this.deps.logger, "info", "session.completed", {
        session_id: sessionId,
        interview_type: session.interviewType,
      }, { questionCount: session.questions.length });
      return {
        kind: "completed",
        session: cloneSession(session),
        evaluation,
        ...(followUpError ? { followUpError } : {}),
      };
    }

    this.transition(record, "AwaitingAnswer");
    return {
      kind: "next_question",
      session: cloneSession(session),
      evaluation,
      nextQuestion: session.questions[session.currentIndex],
      followUpInserted,
      ...(followUpError ? { followUpError } : {}),
    };
  }

  async abort(sessionId: string, reason: string): Promise<InterviewSession> {
    const record = this.getRecord(sessionId);
    if (isTerminalState(record.session.state)) {
      throw new CoachError("InvalidState", `Session ${sessionId} is already ${record.session.state}.`, {
        sessionId,
        state: record.session.state,
      });
    }
    await this.abortRecord(record, reason.trim() || "aborted");
    return cloneSession(record.session);
  }

  finalize(sessionId: string): SessionSummary {
    const record = this.getRecord(sessionId);
    if (record.session.state !== "Completed") {
      throw new CoachError("NotCompleted", `Session ${sessionId} is not completed (state: ${record.session.state}).`, {
        sessionId,
        state: record.session.state,
      });
    }
    return summarizeSession(record.session, this.deps.policy.weakAreaThreshold);
  }

  getSession(sessionId: string): InterviewSession {
    return cloneSession(this.getRecord(sessionId).session);
  }

  getGaps(sessionId: string): GapEntry[] {
    return [...this.getRecord(sessionId).gaps];
  }

  sessionCount(): number {
    return this.records.size;
  }

  release(sessionId: string): void {
    const record = this.getRecord(sessionId);
    if (!isTerminalState(record.session.state)) {
      throw new CoachError("InvalidState", `Session ${sessionId} is still active.`, { sessionId });
    }
    this.clearTimeout(record);
    this.records.delete(sessionId);
    logContext(this.deps.logger, "info", "session.released", {
      session_id: sessionId,
      current_state: record.session.state,
    });
  }

  dispose(): void {
    for (const record of this.records.values()) {
      this.clearTimeout(record);
    }
    this.records.clear();
  }

  private priorExchanges(record: SessionRecord): PriorExchange[] {
    const { session } = record;
    return session.questions.flatMap((question) => {
      const answer = session.answers[question.id];
      return answer?.evaluation ? [{ question, answer }] : [];
    });
  }

  private needsFollowUp(session: InterviewSession, question: Question, evaluation: Evaluation): boolean {
    if (!this.deps.policy.adaptiveFollowUps || question.followUpOf) {
      return false;
    }
    if (evaluation.score >= this.deps.policy.followUpThreshold) {
      return false;
    }
    return !session.questions.some((item) => item.followUpOf === question.id);
  }

  private insertFollowUp(session: InterviewSession, parent: Question, followUp: Question): boolean {
    const id = followUp.id.trim();
    const text = followUp.text.trim();
    if (!isUsableQuestionId(id) || !text || session.questions.some((item) => item.id === id)) {
      return false;
    }
    const question = freezeQuestion({
      id,
      text,
      type: session.interviewType,
      followUpOf: parent.id,
      ...(followUp.targetSkill ? { targetSkill: followUp.targetSkill } : {}),
    });
    session.questions.splice(session.currentIndex + 1, 0, question);
    return true;
  }

  private async abortRecord(record: SessionRecord, reason: string): Promise<void> {
    const { session } = record;
    this.transition(record, "Aborted");
    session.abortReason = reason;
    record.epoch += 1;
    this.scheduleEviction(record);
    logContext(this.deps.logger, "info", "session.aborted", {
      session_id: session.id,
      interview_type: session.interviewType,
    }, { reason, answeredCount: Object.keys(session.answers).length });
    await this.archive(record);
  }

  private discarded(record: SessionRecord): SubmitAnswerResult {
    logContext(this.deps.logger, "info", "session.result.discarded", {
      session_id: record.session.id,
      current_state: record.session.state,
    });
    return {
      kind: "discarded",
      session: cloneSession(record.session),
      reason: record.session.abortReason ?? "aborted",
    };
  }

  private transition(record: SessionRecord, to: SessionState): void {
    assertTransition(record.session.state, to);
    record.session.state = to;
    record.session.updatedAt = this.now();
  }

  private armTimeout(record: SessionRecord, timeoutMs: number): void {
    const sessionId = record.session.id;
    record.timer = setTimeout(() => {
      void this.expire(sessionId);
    }, timeoutMs);
    record.timer.unref();
  }

  private async expire(sessionId: string): Promise<void> {
    const record = this.records.get(sessionId);
    if (!record || isTerminalState(record.session.state)) {
      return;
    }
    try {
      await this.abortRecord(record, TIMEOUT_ABORT_REASON);
    } catch (error) {
      this.deps.logger.error("session.timeout.abort_failed", { sessionId, error: describeError(error) });
    }
  }

  private scheduleEviction(record: SessionRecord): void {
    this.clearTimeout(record);
    record.timer = setTimeout(() => {
      this.evict(record);
    }, this.deps.policy.finishedSessionTtlMs);
    record.timer.unref();
  }

  private evict(record: SessionRecord): void {
    const sessionId = record.session.id;
    if (this.records.get(sessionId) !== record) {
      return;
    }
    record.timer = undefined;
    this.records.delete(sessionId);
    logContext(this.deps.logger, "debug", "session.evicted", {
      session_id: sessionId,
      current_state: record.session.state,
    });
  }

  private clearTimeout(record: SessionRecord): void {
    if (record.timer) {
      clearTimeout(record.timer);
      record.timer = undefined;
    }
  }

  private async archive(record: SessionRecord): Promise<void> {
    if (!this.deps.storage) {
      return;
    }
    try {
      await this.deps.storage.save(cloneSession(record.session));
    } catch (error) {
      // The in-memory session stays authoritative.
      this.deps.logger.error("session.archive.failed", {
        sessionId: record.session.id,
        error: describeError(error),
      });
    }
  }

  private getRecord(sessionId: string): SessionRecord {
    const record = this.records.get(sessionId);
    if (!record) {
      throw new CoachError("SessionNotFound", `Session not found: ${sessionId}`, { sessionId });
    }
    return record;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

export function parseInterviewType(value: string): InterviewType {
  const type = INTERVIEW_TYPES.find((item) => item === value);
  if (!type) {
    throw new CoachError("InvalidConfiguration", `Unsupported interview type: ${value}`, {
      supported: INTERVIEW_TYPES,
    });
  }
  return type;
}

function sanitizeEvaluation(evaluation: Evaluation): Evaluation {
  if (!Number.isFinite(evaluation.score) || evaluation.score < 0 || evaluation.score > 1) {
    throw new CoachError("InvalidConfiguration", `Evaluator returned a score outside [0, 1]: ${evaluation.score}`);
  }
  return Object.freeze({
    score: evaluation.score,
    strengths: Object.freeze([...evaluation.strengths]),
    weaknesses: Object.freeze([...evaluation.weaknesses]),
    ...(evaluation.feedback ? { feedback: freezeFeedback(evaluation.feedback) } : {}),
  });
}

function freezeFeedback(feedback: AnswerFeedback): AnswerFeedback {
  return Object.freeze({
    detailedFeedback: feedback.detailedFeedback,
    suggestions: Object.freeze([...feedback.suggestions]),
    quickTips: Object.freeze([...feedback.quickTips]),
  });
}
