export type StageName =
  | 'generate_intent'
  | 'generate_call_plan'
  | 'iterative_refinement'
  | 'create_system_prompt'
  | 'summarize_call_log';

/** Sentinel `next` value marking a terminal action. */
export const END_SCENARIO = 'END';

export interface Intent {
  callerRole?: string;
  recipientRole?: string;
  purpose?: string;
  context?: string;
  [key: string]: unknown;
}

export interface PlanAction {
  action: string;
  /** Name of the scenario the conversation moves to, or `END`. */
  next: string;
  [key: string]: unknown;
}

export interface Scenario {
  name: string;
  description: string;
  chainOfThought: string;
  possibleActions: PlanAction[];
  [key: string]: unknown;
}

export interface CallPlan {
  scenarios: Scenario[];
  [key: string]: unknown;
}

export interface SystemPromptBundle {
  systemPrompt: string;
  firstMessage: string;
}

export type CallResult = 'success' | 'failure';

export interface CallSummary {
  recipient: string;
  purpose: string;
  result: CallResult;
  failureReason: string | null;
  nextSteps: string;
  additionalDetails: string;
}

export interface TranscriptTurn {
  role: string;
  text: string;
}

export interface CallPlanningResult {
  intent: Intent;
  plan: CallPlan;
  /** Normalized synthesis output, returned as text. */
  systemPrompt: string;
  bundle: SystemPromptBundle | null;
}

export type PromptVariables = Record<string, string>;
