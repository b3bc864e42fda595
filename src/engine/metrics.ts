import type { FieldName, Tier, ValidationResult } from '../types';
import type { MetricsRecord } from '../schemas/snapshot';
import type { ComponentStore } from './store';

// Heuristic display numbers, not measured probabilities.
export const TIER_BASE_RATE: Record<Tier, number> = {
  minimal: 0.85,
  guided: 0.92,
  full: 0.98
};

export interface MetricsOptions {
  now?: () => number; // epoch ms
}

export class MetricsTracker {
  readonly tier: Tier;
  readonly totalComponents: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private endedAt: number | null = null;
  private readonly filledFields = new Set<FieldName>();
  private offered = 0;
  private used = 0;
  private validationScore = 0;
  private satisfaction: number | null = null;

  constructor(store: ComponentStore, options: MetricsOptions = {}) {
    this.tier = store.tier;
    this.totalComponents = store.totalFields;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();

    for (const d of store.fields) {
      if (store.isFilled(d.name)) this.filledFields.add(d.name);
    }
    store.onChange((field, filled) => {
      if (filled) this.filledFields.add(field);
    });
  }

  get componentsFilled(): number {
    return this.filledFields.size;
  }

  get suggestionsOffered(): number {
    return this.offered;
  }

  get suggestionsUsed(): number {
    return this.used;
  }

  get finalized(): boolean {
    return this.endedAt !== null;
  }

  get userSatisfaction(): number | null {
    return this.satisfaction;
  }

  /** Seconds spent building; keeps growing until finalize(). */
  get timeToCreate(): number {
    const end = this.endedAt ?? this.now();
    return (end - this.startedAt) / 1000;
  }

  get successRate(): number {
    return TIER_BASE_RATE[this.tier] * (this.componentsFilled / Math.max(this.totalComponents, 1));
  }

  finalize(): void {
    if (this.endedAt === null) this.endedAt = this.now();
  }

  recordSuggestionOffered(): void {
    this.offered++;
  }

  recordSuggestionUsed(): void {
    this.used++;
  }

  recordValidation(result: ValidationResult): void {
    this.validationScore = result.overallScore;
  }

  setUserSatisfaction(rating: number): void {
    if (!Number.isFinite(rating) || rating < 1 || rating > 10) {
      throw new RangeError(`Satisfaction rating must be between 1 and 10, got ${rating}`);
    }
    this.satisfaction = rating;
  }

  toJSON(): MetricsRecord {
    return {
      tier: this.tier,
      time_to_create_seconds: this.timeToCreate,
      components_filled: this.componentsFilled,
      total_components: this.totalComponents,
      suggestions_used: this.used,
      suggestions_offered: this.offered,
      validation_score: this.validationScore,
      estimated_success_rate: this.successRate,
      user_satisfaction: this.satisfaction
    };
  }
}
