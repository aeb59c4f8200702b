import { loadConfig } from "../config/loader.js";
import type { TonewatchConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { SlackChatProvider, createSlackWebClient } from "../channels/slack/client.js";
import { OpenAIClient } from "../llm/openai.js";
import { ContextAssembler } from "../moderation/context.js";
import { Notifier } from "../moderation/notifier.js";
import { ModerationPipeline } from "../moderation/pipeline.js";
import { CategoryScorer } from "../moderation/scorer.js";
import { SimilarityDetector } from "../moderation/similarity.js";
import { ScoreLog } from "../summary/store.js";
import { SummaryScheduler } from "../summary/scheduler.js";
import { EventServer } from "./server.js";

export interface ServiceContext {
  config: TonewatchConfig;
  logger: Logger;
  pipeline: ModerationPipeline;
  scores: ScoreLog;
  summary: SummaryScheduler;
  server: EventServer;
  shutdown: () => Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startService(configPath?: string): Promise<ServiceContext> {
  // 1. Load config; missing secrets throw here, before anything starts
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting tonewatch...");

  // 3. External collaborators
  const chat = new SlackChatProvider(createSlackWebClient(config.slack.botToken));
  const openai = new OpenAIClient(config.openai);

  // 4. Pipeline
  const scores = new ScoreLog();
  const notifier = new Notifier(chat, logger);
  const pipeline = new ModerationPipeline({
    similarity: new SimilarityDetector(openai, config.thresholds, logger),
    context: new ContextAssembler(
      chat,
      { limit: config.slack.historyLimit, maxAttempts: config.slack.historyAttempts },
      logger,
    ),
    scorer: new CategoryScorer(openai, logger),
    notifier,
    scores,
    thresholds: config.thresholds,
    detection: config.detection,
    logger,
  });

  // 5. Weekly digest, started once for the life of the process
  const summary = new SummaryScheduler(scores, chat, config.summary, logger);
  if (config.summary.enabled) {
    summary.start();
  }

  // 6. Event server
  const server = new EventServer({
    signingSecret: config.slack.signingSecret,
    port: config.server.port,
    hostname: config.server.hostname,
    eventsPath: config.server.eventsPath,
    dispatch: (message) => pipeline.handle(message),
    logger,
  });
  await server.start();
  logger.info(
    { port: config.server.port, path: config.server.eventsPath },
    "Event server started",
  );

  // 7. Graceful shutdown
  let shutdownInProgress = false;
  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    summary.stop();
    await server.stop();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("tonewatch started");
  return { config, logger, pipeline, scores, summary, server, shutdown };
}
