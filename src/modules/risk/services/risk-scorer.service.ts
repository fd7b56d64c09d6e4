import { Injectable } from '@nestjs/common';
import {
  BREACHED_MIN_SCORE,
  HIGH_THRESHOLD,
  MEDIUM_THRESHOLD,
} from '../risk.constants';
import {
  BreachFlags,
  RiskAssessment,
  RiskFactor,
  RiskLabel,
} from '../types/risk.types';

const NO_BREACH: BreachFlags = { offlineHit: false, onlineHit: false };

@Injectable()
export class RiskScorerService {
  score(
    factors: RiskFactor[],
    breach: BreachFlags = NO_BREACH,
    onlineCount?: number,
  ): RiskAssessment {
    let total = 0;
    const reasons: string[] = [];

    for (const factor of factors) {
      const contribution = this.contribution(factor);
      total += contribution;
      if (contribution !== 0) reasons.push(factor.detail);
    }

    let riskScore = Math.round(Math.min(Math.max(total, 0), 1) * 100) / 100;
    let label = this.toLabel(riskScore);

    if (breach.offlineHit) {
      reasons.push('Matches a password from the offline breach corpus');
    }
    if (breach.onlineHit) {
      reasons.push(
        onlineCount !== undefined
          ? `Found ${onlineCount} times in the online breach database`
          : 'Found in the online breach database',
      );
    }
    if (breach.offlineHit || breach.onlineHit) {
      riskScore = Math.max(riskScore, BREACHED_MIN_SCORE);
      label = 'high';
    }

    return { riskScore, label, reasons };
  }

  toLabel(score: number): RiskLabel {
    if (score >= HIGH_THRESHOLD) return 'high';
    if (score >= MEDIUM_THRESHOLD) return 'medium';
    return 'low';
  }

  private contribution(factor: RiskFactor): number {
    if (factor.kind === 'protective') {
      return factor.triggered ? -factor.weight : factor.weight;
    }
    return factor.triggered ? factor.weight : 0;
  }
}
