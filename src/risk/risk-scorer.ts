import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { ModelArtifactError, ScoringConfigurationError, describeError } from '../errors.js';
import { loadScoringContext } from './scoring-context.js';
import { ruleBasedPoints } from './rule-based-scorer.js';
import { riskFactorsOf } from './risk-factors.js';
import { clampScore, levelForScore } from './risk-levels.js';
import type { FeatureVector, RiskAssessment, ScoringContext, ScoringMethod } from '../types/index.js';

function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

/**
 * Logistic-regression scoring over standardized features. Without a
 * ScoringContext it falls back to the rule-based weighted sum. Stateless per
 * call, so one instance serves every concurrent asset.
 */
export class RiskScorer {
  private readonly context: ScoringContext | null;

  constructor(context: ScoringContext | null) {
    this.context = context;
  }

  /** Loads the artifacts once; unusable artifacts switch to the fallback instead of failing. */
  static fromArtifacts(modelDir?: string, logger: winston.Logger = createLogger({ name: 'risk-scorer' })): RiskScorer {
    try {
      const context = loadScoringContext(modelDir);
      logger.info(`Loaded risk model ${context.classifier.version} (scaler ${context.scaler.version})`);
      return new RiskScorer(context);
    } catch (error) {
      if (!(error instanceof ModelArtifactError)) throw error;
      logger.warn(`${describeError(error)}; using rule-based scoring`);
      return new RiskScorer(null);
    }
  }

  get method(): ScoringMethod {
    return this.context ? 'model' : 'rule_based';
  }

  score(features: FeatureVector): RiskAssessment {
    const riskFactors = riskFactorsOf(features);

    if (!this.context) {
      const score = clampScore(ruleBasedPoints(features));
      return {
        score,
        level: levelForScore(score),
        confidence: score / 100,
        method: 'rule_based',
        riskFactors,
      };
    }

    const probability = this.predictProbability(this.context, features);
    const score = clampScore(probability * 100);

    return {
      score,
      level: levelForScore(score),
      confidence: probability,
      method: 'model',
      riskFactors,
    };
  }

  private predictProbability(context: ScoringContext, features: FeatureVector): number {
    const { featureNames, scaler, classifier } = context;
    const width = featureNames.length;

    if (scaler.mean.length !== width || scaler.scale.length !== width || classifier.weights.length !== width) {
      throw new ScoringConfigurationError(
        `Model artifacts do not match the feature vector: ${width} features, ` +
        `${scaler.mean.length} means, ${scaler.scale.length} scales, ${classifier.weights.length} weights`
      );
    }

    let z = classifier.bias;
    for (let i = 0; i < width; i++) {
      const name = featureNames[i];
      const value = name === undefined ? undefined : features[name];
      const mean = scaler.mean[i];
      const scale = scaler.scale[i];
      const weight = classifier.weights[i];

      if (value === undefined || !Number.isFinite(value) || mean === undefined || scale === undefined || weight === undefined) {
        throw new ScoringConfigurationError(`Feature ${name ?? i} has no usable value`);
      }

      z += weight * ((value - mean) / scale);
    }

    return sigmoid(z);
  }
}
