import type { CallSummary, TranscriptTurn } from '../types';
import { callSummarySchema } from '../schemas';
import { summaryPrompt } from '../prompts';
import { runStructuredStage, stageLogger, type PipelineContext, type StructuredStage } from './stage';

const summaryStage: StructuredStage<CallSummary> = {
  name: 'summarize_call_log',
  prompt: summaryPrompt,
  schema: callSummarySchema,
};

export function formatTranscript(turns: TranscriptTurn[]): string {
  return turns
    .map((t) => `${t.role === 'agent' ? 'AI Agent' : 'Recipient'}: ${t.text}`)
    .join('\n');
}

export async function runCallSummary(ctx: PipelineContext, transcript: string): Promise<CallSummary> {
  if (transcript.trim().length === 0) {
    throw new Error('Transcript is empty');
  }

  const summary = await runStructuredStage(ctx, summaryStage, { call_log: transcript });
  stageLogger(ctx, summaryStage.name).info('Call summarized', {
    result: summary.result,
    failureReason: summary.failureReason,
  });
  return summary;
}
