import { RISK_WEIGHTS } from '../risk.constants';
import { RiskFactor, RiskFactorName } from '../types/risk.types';
import { RiskScorerService } from './risk-scorer.service';

const ORDER: RiskFactorName[] = [
  'length',
  'diversity',
  'sequence',
  'repetition',
  'substitution',
  'dictionary',
];

function factors(
  triggered: Partial<Record<RiskFactorName, boolean>>,
): RiskFactor[] {
  return ORDER.map((name) => ({
    name,
    kind: name === 'diversity' ? 'protective' : 'risk',
    weight: RISK_WEIGHTS[name],
    triggered: triggered[name] ?? false,
    detail: `${name}:${triggered[name] ? 'on' : 'off'}`,
  }));
}

describe('RiskScorerService', () => {
  const scorer = new RiskScorerService();

  it('adds triggered risk weights and the missing-diversity weight', () => {
    expect(scorer.score(factors({ length: true, repetition: true }))).toEqual({
      riskScore: 0.85,
      label: 'high',
      reasons: ['length:on', 'diversity:off', 'repetition:on'],
    });
  });

  it('subtracts a triggered protective factor and clamps at zero', () => {
    expect(scorer.score(factors({ diversity: true, sequence: true }))).toEqual({
      riskScore: 0,
      label: 'low',
      reasons: ['diversity:on', 'sequence:on'],
    });
  });

  it('clamps at one', () => {
    const all = factors({
      length: true,
      sequence: true,
      repetition: true,
      substitution: true,
      dictionary: true,
    });
    expect(scorer.score(all).riskScore).toBe(1);
  });

  it('scores a medium password', () => {
    const result = scorer.score(
      factors({
        length: true,
        diversity: true,
        substitution: true,
        dictionary: true,
      }),
    );
    expect(result.riskScore).toBe(0.55);
    expect(result.label).toBe('medium');
  });

  it('forces breached passwords to high with a minimum score', () => {
    const result = scorer.score(factors({ diversity: true }), {
      offlineHit: true,
      onlineHit: false,
    });
    expect(result).toEqual({
      riskScore: 0.9,
      label: 'high',
      reasons: [
        'diversity:on',
        'Matches a password from the offline breach corpus',
      ],
    });
  });

  it('keeps a higher heuristic score when breached', () => {
    const result = scorer.score(
      factors({ length: true, repetition: true, sequence: true }),
      { offlineHit: false, onlineHit: true },
      42,
    );
    expect(result.riskScore).toBe(1);
    expect(result.reasons[result.reasons.length - 1]).toBe(
      'Found 42 times in the online breach database',
    );
  });

  it('appends breach reasons after factor reasons in a fixed order', () => {
    const { reasons } = scorer.score(
      factors({ length: true }),
      { offlineHit: true, onlineHit: true },
      3,
    );
    expect(reasons.slice(-2)).toEqual([
      'Matches a password from the offline breach corpus',
      'Found 3 times in the online breach database',
    ]);
  });

  it.each([
    [0, 'low'],
    [0.33, 'low'],
    [0.34, 'medium'],
    [0.66, 'medium'],
    [0.67, 'high'],
    [1, 'high'],
  ])('labels %s as %s', (score, label) => {
    expect(scorer.toLabel(score)).toBe(label);
  });
});
