import { NO_AUTONOMOUS_DECISIONS } from './policy';

export const systemPromptPrompt = `You write system prompts for a conversational voice agent that places phone calls. The call plan below lists the scenarios the agent may face:
{plan_json}

Call intent: {intent}

Instructions:
1. Explain the situation, the agent's role as the caller, who the other party is, and the purpose of the call.
2. Condense the plan into clear instructions for reacting to the other party's messages.
3. State when the call ends: either the purpose has been achieved, or a decision is needed that the intent does not cover.
4. ${NO_AUTONOMOUS_DECISIONS}
5. Give the first message the agent says when the call connects. A short greeting is enough.

Answer in this JSON format:
\`\`\`json
{{
  "system_prompt": "the system prompt",
  "first_message": "the first message"
}}
\`\`\``;
