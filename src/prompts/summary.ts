export const summaryPrompt = `Summarize the phone call record below as a JSON object with these keys:
1. "recipient": who answered the call.
2. "purpose": why the call was made.
3. "result": "success" if the purpose was achieved, otherwise "failure".
4. "failureReason": when the call failed, the reason given in the record; otherwise null.
5. "nextSteps": what the user should do next (for example call back, or make a decision).
6. "additionalDetails": anything else from the call the user should know.

Call record:
{call_log}

Output only the JSON summary, with no explanation.`;
