import { createApp } from "./app";
import { createCoach } from "./coach/coach.factory";
import { loadEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { loadResourceCatalog } from "./recommendations/resource-catalog";
import { loadSkillVocabulary } from "./skills/skill-vocabulary";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const [vocabulary, catalog] = await Promise.all([
    loadSkillVocabulary(env.skillVocabularyPath),
    loadResourceCatalog(env.resourceCatalogPath),
  ]);
  logger.info("coach.assets.loaded", {
    skills: vocabulary.entries.length,
    resources: catalog.resources.length,
  });

  const coach = createCoach(env, { vocabulary, catalog }, logger);
  const app = createApp(coach, logger);

  const server = app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
  });

  const shutdown = (signal: string): void => {
    logger.info("Server stopping", { signal });
    coach.dispose();
    server.close();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
