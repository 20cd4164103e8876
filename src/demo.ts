#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { config } from './config';
import { createOpenAICompletionService } from './services/completion';
import { runCallPlanning } from './services/planner';
import { runCallSummary } from './services/summary';
import { logger, errorMessage } from './utils/logger';

const SAMPLE_REQUEST =
  'Ask my car insurance company when my policy expires, and say I want to renew it.';
const SAMPLE_TRANSCRIPT = path.join(__dirname, '..', 'samples', 'transcript.txt');

function print(title: string, value: unknown) {
  console.log(`\n[${title}]`);
  console.log(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
}

async function main() {
  const [command = 'plan', arg, iterationsArg] = process.argv.slice(2);

  const completion = createOpenAICompletionService({
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    temperature: config.openai.temperature,
    timeoutMs: config.completion.timeoutMs,
    maxRetries: config.completion.maxRetries,
  });

  if (command === 'plan') {
    const iterations = iterationsArg ? parseInt(iterationsArg, 10) : config.planner.refinementIterations;
    const result = await runCallPlanning({ completion }, arg || SAMPLE_REQUEST, { refinementIterations: iterations });
    print('Intent', result.intent);
    print('Refined Call Plan', result.plan);
    print('System Prompt', result.bundle ?? result.systemPrompt);
    return;
  }

  if (command === 'summary') {
    const transcript = fs.readFileSync(arg || SAMPLE_TRANSCRIPT, 'utf-8');
    print('Call Summary', await runCallSummary({ completion }, transcript));
    return;
  }

  throw new Error(`Unknown command "${command}". Usage: demo plan [request] [iterations] | demo summary [transcript-file]`);
}

main().catch((err) => {
  logger.error('Demo run failed', { error: errorMessage(err) });
  process.exit(1);
});
