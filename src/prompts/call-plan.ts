import { NO_AUTONOMOUS_DECISIONS } from './policy';

export const callPlanPrompt = `You are an expert call planner. Reason step by step about the call intent below and produce a JSON plan describing the situations that can come up during the call and how the caller (you) should react to each of them.

Call intent: {intent}

Requirements:
1. Put the situations in an array under the key "scenarios". Focus on situations triggered by what the other party says.
2. Every scenario has:
   - "name": a short name, unique within the plan.
   - "description": one or two sentences describing the situation.
   - "chainOfThought": your reasoning for this scenario: what the other party may say or do next, and which responses are open to you.
   - "possibleActions": a list of objects shaped like {{ "action": "what the caller says or does in response", "next": "name of the next scenario, or END" }}.
3. Plan reactively: later scenarios should follow from the actions of earlier ones.
4. Use "END" as the next step once the purpose of the call is achieved.
5. ${NO_AUTONOMOUS_DECISIONS}
6. Output only the JSON plan, with no explanation.`;
