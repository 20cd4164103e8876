import { END_SCENARIO, type CallPlan } from '../types';

export interface DanglingTransition {
  scenario: string;
  action: string;
  next: string;
}

export interface PlanReport {
  danglingTransitions: DanglingTransition[];
  duplicateNames: string[];
}

/**
 * Checks the plan's transitions against its scenario names. Findings are
 * reported only; the plan itself is never altered.
 */
export function analyzePlan(plan: CallPlan): PlanReport {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const scenario of plan.scenarios) {
    if (seen.has(scenario.name)) duplicates.add(scenario.name);
    seen.add(scenario.name);
  }

  const danglingTransitions: DanglingTransition[] = [];
  for (const scenario of plan.scenarios) {
    for (const action of scenario.possibleActions) {
      if (action.next !== END_SCENARIO && !seen.has(action.next)) {
        danglingTransitions.push({ scenario: scenario.name, action: action.action, next: action.next });
      }
    }
  }

  return { danglingTransitions, duplicateNames: [...duplicates] };
}
