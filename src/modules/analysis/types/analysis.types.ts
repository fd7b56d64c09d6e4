import { BreachResult } from '../../breach-check/types/breach.types';
import { RiskLabel } from '../../risk/types/risk.types';

export interface AnalysisRequest {
  password: string;
  enableOnline?: boolean;
  timeoutMs?: number;
  suggestionCount?: number;
  signal?: AbortSignal;
}

export interface AnalysisResult {
  readonly password: string;
  readonly riskScore: number;
  readonly label: RiskLabel;
  readonly reasons: readonly string[];
  readonly suggestions: readonly string[];
  readonly breach: Readonly<BreachResult>;
}

/** Flat shape handed to serializers and the CLI. */
export interface AnalysisReport {
  password: string;
  risk_score: number;
  label: RiskLabel;
  reasons: string[];
  suggestions: string[];
  breached_offline: boolean;
  breached_online: boolean | null;
  hibp_count?: number;
}
