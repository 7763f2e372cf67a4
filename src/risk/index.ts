export { RiskScorer } from './risk-scorer.js';
export { FeatureExtractor, extractFeatures, toOrderedVector, exposureTypeScore, securityHeadersScore, SSL_EXPIRY_SENTINEL } from './feature-extractor.js';
export { createScoringContext, loadScoringContext, DEFAULT_MODEL_DIR, SCALER_FILE, CLASSIFIER_FILE } from './scoring-context.js';
export { ruleBasedPoints } from './rule-based-scorer.js';
export { riskFactorsOf } from './risk-factors.js';
export { levelForScore, clampScore } from './risk-levels.js';
