import assert from "node:assert/strict";
import { describe, test } from "node:test";
import {
  extractKeywords,
  HeuristicAnswerEvaluator,
  NO_RESPONSE_SUGGESTION,
  NO_RESPONSE_WEAKNESS,
  QUICK_TIPS,
  scoreAnswer,
} from "../../interviews/answer-evaluator";
import { AnswerEvaluatorService, normalizeScore } from "../../interviews/answer-evaluator.service";
import { Answer, Question } from "../../shared/types/session.types";
import { noopLogger, profileWith, skill } from "../helpers/fixtures";

const python = skill("Python", "technical", ["py", "python3"]);
const kubernetes = skill("Kubernetes", "technical", ["k8s", "kube"]);

const pythonQuestion: Question = {
  id: "q1",
  text: "Describe a project where you used Python. What did you personally build?",
  type: "technical",
  targetSkill: python,
};

const kubernetesQuestion: Question = {
  id: "q2",
  text: "What is the hardest problem you solved with Kubernetes, and how did you debug it?",
  type: "technical",
  targetSkill: kubernetes,
};

function answer(questionId: string, rawText: string): Answer {
  return { questionId, rawText, inputType: "text" };
}

describe("HeuristicAnswerEvaluator", () => {
  const evaluator = new HeuristicAnswerEvaluator();

  test("scores an empty answer as no response", async () => {
    for (const text of ["", "   \n\t"]) {
      const evaluation = await evaluator.evaluate(pythonQuestion, answer("q1", text), profileWith([]));
      assert.deepEqual(evaluation, {
        score: 0,
        strengths: [],
        weaknesses: [NO_RESPONSE_WEAKNESS],
        feedback: {
          detailedFeedback: "Score 0/100. No clear strong points yet. To improve: no response provided.",
          suggestions: [NO_RESPONSE_SUGGESTION],
          quickTips: [...QUICK_TIPS.technical],
        },
      });
    }
  });

  test("combines relevance, completeness and specificity", () => {
    const evaluation = scoreAnswer(
      pythonQuestion,
      answer("q1", "I built a Python service that cut report time by 40% for 200 users."),
      profileWith([], 0),
    );
    assert.deepEqual(evaluation, {
      score: 0.51,
      strengths: ["refers to Python explicitly", "includes concrete specifics"],
      weaknesses: ["answer drifts away from the question", "answer is too brief"],
      feedback: {
        detailedFeedback:
          "Score 51/100. Strong points: refers to Python explicitly, includes concrete specifics. To improve: answer drifts away from the question, answer is too brief.",
        suggestions: [
          "Answer the question in your first sentence, then add detail.",
          "Add the context, the steps you took and the outcome.",
        ],
        quickTips: [...QUICK_TIPS.technical],
      },
    });
  });

  test("flags a claimed skill the answer does not demonstrate", () => {
    const evaluation = scoreAnswer(kubernetesQuestion, answer("q2", "It is fine."), profileWith([kubernetes], 3));
    assert.equal(evaluation.score, 0.01);
    assert.deepEqual(evaluation.strengths, []);
    assert.deepEqual(evaluation.weaknesses, [
      "answer drifts away from the question",
      "does not mention Kubernetes",
      "answer is too brief",
      "lacks concrete examples or numbers",
      "depth does not yet match the Kubernetes experience on the résumé",
    ]);
  });

  test("pairs every weakness with a suggestion and adds tips for the interview type", () => {
    const evaluation = scoreAnswer(kubernetesQuestion, answer("q2", "It is fine."), profileWith([kubernetes], 3));
    assert.deepEqual(evaluation.feedback?.suggestions, [
      "Answer the question in your first sentence, then add detail.",
      "Name Kubernetes and say what you used it for.",
      "Add the context, the steps you took and the outcome.",
      "Back the answer with one real example and a number.",
      "Prepare a deeper Kubernetes story: a problem you debugged and the trade-offs you weighed.",
    ]);
    assert.equal(evaluation.feedback?.detailedFeedback.startsWith("Score 1/100. No clear strong points yet."), true);

    const behavioral: Question = { id: "b1", text: "Tell me about a conflict in your team.", type: "behavioral" };
    assert.deepEqual(scoreAnswer(behavioral, answer("b1", "We talked."), profileWith([])).feedback?.quickTips, [
      ...QUICK_TIPS.behavioral,
    ]);
  });

  test("never lowers the score when on-topic detail is added", () => {
    const base = "I built a Python service that cut report time by 40% for 200 users.";
    const extended = `${base} I personally designed the project and the build pipeline, and we shipped it in 3 weeks.`;
    const profile = profileWith([python], 4);
    const before = scoreAnswer(pythonQuestion, answer("q1", base), profile).score;
    const after = scoreAnswer(pythonQuestion, answer("q1", extended), profile).score;
    assert.ok(after >= before, `expected ${after} >= ${before}`);
  });

  test("keeps scores inside [0, 1]", () => {
    const long = Array.from({ length: 200 }, () => "I personally built the project build service with Python in 2021.").join(" ");
    const evaluation = scoreAnswer(pythonQuestion, answer("q1", long), profileWith([python], 8));
    assert.ok(evaluation.score >= 0 && evaluation.score <= 1);
    assert.equal(evaluation.score, 1);
  });

  test("extracts question keywords without stopwords or skill words", () => {
    assert.deepEqual(extractKeywords(pythonQuestion.text, python), ["project", "personally", "build"]);
  });
});

describe("AnswerEvaluatorService", () => {
  test("normalizes a 0-100 model score and cleans feedback arrays", async () => {
    const service = new AnswerEvaluatorService(
      {
        async generateStructuredJson() {
          return JSON.stringify({ score: 80, strengths: ["clear structure", "  ", 3], weaknesses: ["no metrics"] });
        },
      },
      new HeuristicAnswerEvaluator(),
      noopLogger,
    );
    const evaluation = await service.evaluate(pythonQuestion, answer("q1", "I used Python daily."), profileWith([]));
    assert.deepEqual(evaluation, {
      score: 0.8,
      strengths: ["clear structure"],
      weaknesses: ["no metrics"],
      feedback: {
        detailedFeedback: "Score 80/100. Strong points: clear structure. To improve: no metrics.",
        suggestions: [],
        quickTips: [...QUICK_TIPS.technical],
      },
    });
  });

  test("keeps the model's detailed feedback, suggestions and tips", async () => {
    const service = new AnswerEvaluatorService(
      {
        async generateStructuredJson() {
          return JSON.stringify({
            score: 0.4,
            strengths: [],
            weaknesses: ["no outcome"],
            detailed_feedback: "  You described the setup\n but not the result. ",
            suggestions: "Say what changed after the rollout.",
            quick_tips: ["Lead with the result."],
          });
        },
      },
      new HeuristicAnswerEvaluator(),
      noopLogger,
    );
    const evaluation = await service.evaluate(kubernetesQuestion, answer("q2", "We set up a cluster."), profileWith([]));
    assert.deepEqual(evaluation.feedback, {
      detailedFeedback: "You described the setup but not the result.",
      suggestions: ["Say what changed after the rollout."],
      quickTips: ["Lead with the result."],
    });
  });

  test("falls back to the heuristic when the model omits a score", async () => {
    const service = new AnswerEvaluatorService(
      {
        async generateStructuredJson() {
          return JSON.stringify({ strengths: ["ok"] });
        },
      },
      new HeuristicAnswerEvaluator(),
      noopLogger,
    );
    const submitted = answer("q2", "It is fine.");
    const profile = profileWith([kubernetes], 3);
    assert.deepEqual(await service.evaluate(kubernetesQuestion, submitted, profile), scoreAnswer(kubernetesQuestion, submitted, profile));
  });

  test("falls back to the heuristic when the model call fails", async () => {
    const service = new AnswerEvaluatorService(
      {
        async generateStructuredJson(): Promise<string> {
          throw new Error("boom");
        },
      },
      new HeuristicAnswerEvaluator(),
      noopLogger,
    );
    const evaluation = await service.evaluate(kubernetesQuestion, answer("q2", "It is fine."), profileWith([kubernetes], 3));
    assert.equal(evaluation.score, 0.01);
  });

  test("does not call the model for an empty answer", async () => {
    let calls = 0;
    const service = new AnswerEvaluatorService(
      {
        async generateStructuredJson() {
          calls += 1;
          return "{\"score\": 1}";
        },
      },
      new HeuristicAnswerEvaluator(),
      noopLogger,
    );
    const evaluation = await service.evaluate(pythonQuestion, answer("q1", "  "), profileWith([]));
    assert.equal(calls, 0);
    assert.deepEqual(evaluation.weaknesses, [NO_RESPONSE_WEAKNESS]);
  });
});

describe("normalizeScore", () => {
  test("maps model scores into [0, 1]", () => {
    assert.equal(normalizeScore(0.734), 0.73);
    assert.equal(normalizeScore("65"), 0.65);
    assert.equal(normalizeScore(250), 1);
    assert.equal(normalizeScore(-1), 0);
    assert.equal(normalizeScore(""), null);
    assert.equal(normalizeScore("abc"), null);
    assert.equal(normalizeScore(undefined), null);
  });
});
