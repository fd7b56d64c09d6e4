import { normalize } from '../../../common/utils/normalize.utils';
import { createTestConfig } from '../../../testing/test-config';
import { DictionaryService } from '../../dictionary/dictionary.service';
import { RiskFactor } from '../types/risk.types';
import { FeatureExtractorService } from './feature-extractor.service';

describe('FeatureExtractorService', () => {
  const extractor = new FeatureExtractorService(
    new DictionaryService(createTestConfig()),
  );

  const extract = (password: string): RiskFactor[] =>
    extractor.extract(password, normalize(password));

  const triggered = (factors: RiskFactor[]) =>
    Object.fromEntries(factors.map((factor) => [factor.name, factor.triggered]));

  it('returns factors in a fixed order', () => {
    expect(extract('anything').map((factor) => factor.name)).toEqual([
      'length',
      'diversity',
      'sequence',
      'repetition',
      'substitution',
      'dictionary',
    ]);
  });

  it('flags only length on the empty password', () => {
    const factors = extract('');
    expect(triggered(factors)).toEqual({
      length: true,
      diversity: false,
      sequence: false,
      repetition: false,
      substitution: false,
      dictionary: false,
    });
    expect(factors[0].detail).toBe(
      'Shorter than the recommended 12 characters (0)',
    );
    expect(factors[1].detail).toBe(
      'Limited character variety (0 of 4 categories)',
    );
  });

  it('detects repetition and weak variety in "aaaa1111"', () => {
    expect(triggered(extract('aaaa1111'))).toEqual({
      length: true,
      diversity: false,
      sequence: false,
      repetition: true,
      substitution: false,
      dictionary: false,
    });
  });

  it('detects a substituted dictionary word in "MyP@ssw0rd"', () => {
    const factors = extract('MyP@ssw0rd');
    expect(triggered(factors)).toEqual({
      length: true,
      diversity: true,
      sequence: false,
      repetition: false,
      substitution: true,
      dictionary: true,
    });
    expect(factors[4].detail).toBe(
      'Uses predictable substitutions of the common word "password"',
    );
    expect(factors[5].detail).toBe('Contains the common word "password"');
  });

  it('does not call plain dictionary words substitutions', () => {
    const { substitution, dictionary } = triggered(extract('sunshinelove'));
    expect(substitution).toBe(false);
    expect(dictionary).toBe(true);
  });

  it('treats "Tr0ub4dor&3xyz!Q" as long and diverse with one run', () => {
    expect(triggered(extract('Tr0ub4dor&3xyz!Q'))).toEqual({
      length: false,
      diversity: true,
      sequence: true,
      repetition: false,
      substitution: false,
      dictionary: false,
    });
  });

  it('uses fixed weights', () => {
    expect(
      extract('').map((factor) => [factor.name, factor.kind, factor.weight]),
    ).toEqual([
      ['length', 'risk', 0.45],
      ['diversity', 'protective', 0.25],
      ['sequence', 'risk', 0.15],
      ['repetition', 'risk', 0.15],
      ['substitution', 'risk', 0.15],
      ['dictionary', 'risk', 0.2],
    ]);
  });
});
