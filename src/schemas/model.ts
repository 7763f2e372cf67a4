import { z } from 'zod';
import { FEATURE_NAMES } from '../types/risk.js';

const FeatureNamesSchema = z
  .array(z.string())
  .refine(
    (names) => names.length === FEATURE_NAMES.length && names.every((name, i) => name === FEATURE_NAMES[i]),
    { message: `featureNames must be exactly [${FEATURE_NAMES.join(', ')}] in that order` }
  );

const FiniteNumber = z.number().finite();

export const ScalerArtifactSchema = z.object({
  formatVersion: z.literal(1),
  kind: z.literal('standard_scaler'),
  version: z.string(),
  featureNames: FeatureNamesSchema,
  mean: z.array(FiniteNumber),
  scale: z.array(FiniteNumber.refine((value) => value !== 0, { message: 'scale entries must be non-zero' })),
});

export const ClassifierArtifactSchema = z.object({
  formatVersion: z.literal(1),
  kind: z.literal('logistic_regression'),
  version: z.string(),
  featureNames: FeatureNamesSchema,
  weights: z.array(FiniteNumber),
  bias: FiniteNumber,
});

export type ScalerArtifact = z.infer<typeof ScalerArtifactSchema>;
export type ClassifierArtifact = z.infer<typeof ClassifierArtifactSchema>;
