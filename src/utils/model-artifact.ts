import { z } from 'zod';
import type { FeatureFrame } from './features.js';
import { dayOfYear, daysInYear } from './time.js';

export const DATE_FEATURE_NAMES = [
  'year',
  'month',
  'day_of_month',
  'day_of_week',
  'day_of_year',
  'day_of_year_sin',
  'day_of_year_cos',
] as const;

export type DateFeatureName = (typeof DATE_FEATURE_NAMES)[number];

export type TreeNode =
  | { leaf: number }
  | { feature: DateFeatureName; threshold: number; left: TreeNode; right: TreeNode };

const featureNameSchema = z.enum(DATE_FEATURE_NAMES);

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({ leaf: z.number() }),
    z.object({
      feature: featureNameSchema,
      threshold: z.number(),
      left: treeNodeSchema,
      right: treeNodeSchema,
    }),
  ]),
);

const estimatorSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('linear'),
    intercept: z.number(),
    coefficients: z.array(z.object({ feature: featureNameSchema, weight: z.number() })),
  }),
  z.object({
    type: z.literal('tree_ensemble'),
    base_margin: z.number().default(0),
    trees: z.array(treeNodeSchema).min(1),
  }),
]);

const artifactBase = {
  format: z.literal('date-pipeline/v1'),
  name: z.string().min(1),
  estimator: estimatorSchema,
};

export const modelArtifactSchema = z.discriminatedUnion('task', [
  z.object({ ...artifactBase, task: z.literal('classification'), threshold: z.number().min(0).max(1).default(0.5) }),
  z.object({ ...artifactBase, task: z.literal('regression') }),
]);

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;
export type Estimator = ModelArtifact['estimator'];

/**
 * Anything that turns a feature frame into one numeric output per row.
 * Classifiers emit 0/1 labels, regressors emit the predicted amount.
 */
export interface Predictor {
  predict(frame: FeatureFrame): number[];
}

const extractDateFeature = (date: Date, feature: DateFeatureName): number => {
  switch (feature) {
    case 'year':
      return date.getUTCFullYear();
    case 'month':
      return date.getUTCMonth() + 1;
    case 'day_of_month':
      return date.getUTCDate();
    case 'day_of_week':
      // Monday = 0 ... Sunday = 6
      return (date.getUTCDay() + 6) % 7;
    case 'day_of_year':
      return dayOfYear(date);
    case 'day_of_year_sin':
      return Math.sin((2 * Math.PI * (dayOfYear(date) - 1)) / daysInYear(date.getUTCFullYear()));
    case 'day_of_year_cos':
      return Math.cos((2 * Math.PI * (dayOfYear(date) - 1)) / daysInYear(date.getUTCFullYear()));
  }
};

const evaluateTree = (node: TreeNode, date: Date): number => {
  let current = node;
  while (!('leaf' in current)) {
    current = extractDateFeature(date, current.feature) < current.threshold ? current.left : current.right;
  }
  return current.leaf;
};

export const computeMargin = (estimator: Estimator, date: Date): number => {
  if (estimator.type === 'linear') {
    return estimator.coefficients.reduce(
      (sum, { feature, weight }) => sum + weight * extractDateFeature(date, feature),
      estimator.intercept,
    );
  }
  return estimator.trees.reduce((sum, tree) => sum + evaluateTree(tree, date), estimator.base_margin);
};

const sigmoid = (value: number): number => 1 / (1 + Math.exp(-value));

export const createPredictor = (artifact: ModelArtifact): Predictor => ({
  predict(frame: FeatureFrame): number[] {
    return frame.rows.map(({ date }) => {
      if (Number.isNaN(date.getTime())) {
        throw new Error(`${artifact.name}: row has an invalid date`);
      }
      const margin = computeMargin(artifact.estimator, date);
      if (!Number.isFinite(margin)) {
        throw new Error(`${artifact.name}: non-finite output for ${date.toISOString()}`);
      }
      if (artifact.task === 'classification') {
        return sigmoid(margin) >= artifact.threshold ? 1 : 0;
      }
      return margin;
    });
  },
});
