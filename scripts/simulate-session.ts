import { createCoach } from "../src/coach/coach.factory";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { loadResourceCatalog } from "../src/recommendations/resource-catalog";
import { loadSkillVocabulary } from "../src/skills/skill-vocabulary";

// Scripted answers, weakest first, so the run shows follow-ups and weak areas.
const ANSWERS = [
  "",
  "I have not used it much.",
  "I built a payment service in Node.js with PostgreSQL. I designed the schema, added indexes and cut p95 latency from 800ms to 120ms for 40k daily users.",
  "I led the migration of our deploy pipeline, wrote the release checklist and we went from weekly to daily releases with fewer incidents.",
];

async function run(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const [vocabulary, catalog] = await Promise.all([
    loadSkillVocabulary(env.skillVocabularyPath),
    loadResourceCatalog(env.resourceCatalogPath),
  ]);
  const coach = createCoach(env, { vocabulary, catalog }, logger, { storage: null });

  try {
    const started = await coach.startSession({
      type: process.argv[2] ?? "technical",
      resume: { format: "text", content: Buffer.from(buildResumeText(), "utf-8") },
      jobDescription: { format: "text", content: Buffer.from(buildJdText(), "utf-8") },
    });
    const sessionId = started.session.id;
    print("gaps", started.gaps.map((gap) => `${gap.skill.canonicalName}=${gap.priorityScore}`));

    let question = started.currentQuestion;
    for (let turn = 0; ; turn += 1) {
      const answer = ANSWERS[turn % ANSWERS.length];
      print("question", `${question.id}: ${question.text}`);
      const result = await coach.submitAnswer(sessionId, question.id, answer);
      if (result.kind === "discarded") {
        throw new Error(`simulate-session failed, session aborted: ${result.reason}`);
      }
      print("score", result.evaluation.score);
      if (result.kind === "completed") {
        break;
      }
      question = result.nextQuestion;
    }

    const report = await coach.buildReport(sessionId);
    print("mean", report.summary.meanScore);
    print("weak areas", report.summary.weakAreas.map((area) => `${area.label}=${area.lowestScore}`));
    print(
      "recommendations",
      report.recommendations.map((item) => `${item.rank}. [${item.category}] ${item.title} (${item.score})`),
    );
  } finally {
    coach.dispose();
  }
}

function buildJdText(): string {
  return [
    "Senior Backend Engineer",
    "Requirements:",
    "- 5+ years of experience with Node.js and TypeScript",
    "- PostgreSQL in production",
    "- Kubernetes and Docker",
    "Nice to have:",
    "- Kafka",
    "- FinTech domain knowledge",
    "Responsibilities:",
    "- Design and operate payment services",
    "- Mentor engineers and review code",
  ].join("\n");
}

function buildResumeText(): string {
  return [
    "Summary: Backend engineer with 6 years of hands-on experience.",
    "Skills: Node.js, TypeScript, PostgreSQL, Redis",
    "Experience",
    "- Built a notification service handling 2M messages a day.",
    "Education",
    "BSc in Computer Science",
  ].join("\n");
}

function print(label: string, value: unknown): void {
  process.stdout.write(`${label}: ${typeof value === "string" ? value : JSON.stringify(value)}\n`);
}

run().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
