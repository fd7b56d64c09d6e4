import { RiskFactorName } from './types/risk.types';

export const MIN_RECOMMENDED_LENGTH = 12;
export const MIN_CHAR_CLASSES = 3;

export const RISK_WEIGHTS: Readonly<Record<RiskFactorName, number>> = {
  length: 0.45,
  diversity: 0.25,
  sequence: 0.15,
  repetition: 0.15,
  substitution: 0.15,
  dictionary: 0.2,
};

export const MEDIUM_THRESHOLD = 0.34;
export const HIGH_THRESHOLD = 0.67;
export const BREACHED_MIN_SCORE = 0.9;
