import type { ValidationResult } from '../types';
import type { ComponentStore } from './store';

// Lengths are counted on trimmed text, matching the filled predicate.
const ROLE_DETAIL_MIN = 20;
const TASK_DETAIL_MIN = 30;
const FULL_TIER_COMPLETENESS_MIN = 0.7;

export function overallScore(clarityScore: number, completenessScore: number): number {
  return (clarityScore / 10) * 0.5 + completenessScore * 0.5;
}

/** Scores the current store contents. Recompute after every mutation; nothing is cached. */
export function validateComponents(store: ComponentStore): ValidationResult {
  const issues: string[] = [];
  const suggestions: string[] = [];
  let clarityScore: number;

  const role = store.text('role').trim();
  if (!role) {
    issues.push('Role is not defined');
    clarityScore = 3.0;
  } else if (role.length < ROLE_DETAIL_MIN) {
    suggestions.push('Consider adding more detail to the role description');
    clarityScore = 6.0;
  } else {
    clarityScore = 8.0;
  }

  const task = store.text('task').trim();
  if (!task) {
    issues.push('Task is not defined');
    clarityScore = Math.min(clarityScore, 3.0);
  } else if (task.length < TASK_DETAIL_MIN) {
    suggestions.push('Task could be more specific');
    clarityScore = Math.min(clarityScore, 7.0);
  }

  if (!store.isFilled('constraints')) {
    suggestions.push('Consider adding constraints to guide behavior');
  }

  const completenessScore = store.filledCount() / store.totalFields;

  if (store.tier === 'full' && completenessScore < FULL_TIER_COMPLETENESS_MIN) {
    clarityScore = Math.min(clarityScore, 6.0);
    suggestions.push('The full tier should make use of its advanced components');
  }

  return {
    isValid: issues.length === 0,
    clarityScore,
    completenessScore,
    overallScore: overallScore(clarityScore, completenessScore),
    issues,
    suggestions
  };
}
