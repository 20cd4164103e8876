export { intentPrompt } from './intent';
export { callPlanPrompt } from './call-plan';
export { refinePlanPrompt } from './refine-plan';
export { systemPromptPrompt } from './system-prompt';
export { summaryPrompt } from './summary';
