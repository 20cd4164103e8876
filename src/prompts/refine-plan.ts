import { NO_AUTONOMOUS_DECISIONS } from './policy';

export const refinePlanPrompt = `Below is the current call plan and the intent it serves.

Current plan:
{plan_json}

Call intent: {intent}

Improve the plan so it is more detailed and directly actionable, reasoning step by step. For every scenario, extend "chainOfThought" to cover:
- whether the scenario belongs in the plan at all; remove scenarios that do not serve the intent.
- follow-up scenarios for actions whose "next" step is not yet defined in the plan, and add them.
- ${NO_AUTONOMOUS_DECISIONS}

Keep exactly the same JSON structure ("scenarios", "name", "description", "chainOfThought", "possibleActions" with "action" and "next").
Output only the refined JSON plan, with no explanation.`;
