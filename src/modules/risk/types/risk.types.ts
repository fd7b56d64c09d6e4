export type RiskFactorName =
  | 'length'
  | 'diversity'
  | 'sequence'
  | 'repetition'
  | 'substitution'
  | 'dictionary';

/**
 * `risk` factors add their weight when triggered. A `protective` factor
 * subtracts its weight when triggered and adds it when it is not.
 */
export type RiskFactorKind = 'risk' | 'protective';

export interface RiskFactor {
  name: RiskFactorName;
  kind: RiskFactorKind;
  weight: number;
  triggered: boolean;
  detail: string;
}

export type RiskLabel = 'low' | 'medium' | 'high';

export interface BreachFlags {
  offlineHit: boolean;
  onlineHit: boolean;
}

export interface RiskAssessment {
  riskScore: number;
  label: RiskLabel;
  reasons: string[];
}
