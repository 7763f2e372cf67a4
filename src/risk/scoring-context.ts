import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ScalerArtifactSchema, ClassifierArtifactSchema } from '../schemas/model.js';
import { ModelArtifactError, describeError } from '../errors.js';
import { FEATURE_NAMES } from '../types/index.js';
import type { ScoringContext } from '../types/index.js';

export const DEFAULT_MODEL_DIR = fileURLToPath(new URL('../../models/', import.meta.url));
export const SCALER_FILE = 'scaler.json';
export const CLASSIFIER_FILE = 'risk-model.json';

function readJson(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ModelArtifactError(`cannot read ${file}: ${describeError(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ModelArtifactError(`${file} is not valid JSON: ${describeError(error)}`);
  }
}

function issues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Validates both artifacts against each other and the feature order. */
export function createScoringContext(scalerInput: unknown, classifierInput: unknown): ScoringContext {
  const scaler = ScalerArtifactSchema.safeParse(scalerInput);
  if (!scaler.success) {
    throw new ModelArtifactError(`scaler: ${issues(scaler.error)}`);
  }

  const classifier = ClassifierArtifactSchema.safeParse(classifierInput);
  if (!classifier.success) {
    throw new ModelArtifactError(`classifier: ${issues(classifier.error)}`);
  }

  const expected = FEATURE_NAMES.length;
  const lengths = {
    'scaler.mean': scaler.data.mean.length,
    'scaler.scale': scaler.data.scale.length,
    'classifier.weights': classifier.data.weights.length,
  };
  for (const [field, length] of Object.entries(lengths)) {
    if (length !== expected) {
      throw new ModelArtifactError(`${field} has ${length} entries, expected ${expected}`);
    }
  }

  return Object.freeze({
    featureNames: FEATURE_NAMES,
    scaler: Object.freeze({
      version: scaler.data.version,
      mean: Object.freeze([...scaler.data.mean]),
      scale: Object.freeze([...scaler.data.scale]),
    }),
    classifier: Object.freeze({
      version: classifier.data.version,
      weights: Object.freeze([...classifier.data.weights]),
      bias: classifier.data.bias,
    }),
  });
}

export function loadScoringContext(modelDir: string = DEFAULT_MODEL_DIR): ScoringContext {
  return createScoringContext(
    readJson(path.join(modelDir, SCALER_FILE)),
    readJson(path.join(modelDir, CLASSIFIER_FILE))
  );
}
