export interface ImportanceWeights {
  readonly mustHave: number;
  readonly niceToHave: number;
}

export interface RecommendationWeights {
  readonly gap: number;
  readonly session: number;
}

export interface CoachPolicy {
  readonly importanceWeights: ImportanceWeights;
  readonly adaptiveFollowUps: boolean;
  readonly followUpThreshold: number;
  readonly questionCount: number;
  readonly questionSeed: number;
  readonly gapSeedCount: number;
  readonly weakAreaThreshold: number;
  readonly recommendationWeights: RecommendationWeights;
  readonly priorityCutoff: number;
  readonly sessionTimeoutMs?: number;
  // How long a completed or aborted session stays readable before it is evicted.
  readonly finishedSessionTtlMs: number;
}
