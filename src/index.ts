import { config } from './config';
import { createApp, listen } from './app';
import { createOpenAICompletionService } from './services/completion';
import { logger, errorMessage } from './utils/logger';

const completion = createOpenAICompletionService({
  apiKey: config.openai.apiKey,
  model: config.openai.model,
  temperature: config.openai.temperature,
  timeoutMs: config.completion.timeoutMs,
  maxRetries: config.completion.maxRetries,
});

const app = createApp({
  pipeline: { completion },
  apiKey: config.api.key,
  refinementIterations: config.planner.refinementIterations,
});

listen(app, config.port)
  .then(() => {
    logger.info(`Server running on port ${config.port}`, {
      nodeEnv: config.nodeEnv,
      model: config.openai.model,
      refinementIterations: config.planner.refinementIterations,
      auth: config.api.key ? 'api-key' : 'none',
    });
  })
  .catch((err) => {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  });
