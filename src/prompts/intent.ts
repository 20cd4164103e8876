export const intentPrompt = `Read the user's request below and describe the phone call it asks for as a JSON object with these keys:
- "caller_role": who is placing the call (the AI agent and whom it represents).
- "recipient_role": who is expected to answer the call.
- "purpose": what the call must achieve.
- "context": any other detail the caller needs.

User request: {user_input}

Output only the JSON object, with no explanation.`;
