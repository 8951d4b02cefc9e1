import { toUtcMidnight } from './time.js';

export interface FeatureRow {
  readonly date: Date;
}

// Single-column tabular input shared by both models.
export interface FeatureFrame {
  readonly columns: readonly ['date'];
  readonly rows: readonly FeatureRow[];
}

export const buildFeatureFrame = (date: Date): FeatureFrame => ({
  columns: ['date'],
  rows: [{ date: toUtcMidnight(date) }],
});
