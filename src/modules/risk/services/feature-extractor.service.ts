import { Injectable } from '@nestjs/common';
import { NormalizedForms } from '../../../common/utils/normalize.utils';
import {
  charClasses,
  codePointLength,
  findRepeatedRun,
  findSequentialRun,
} from '../../../common/utils/password.utils';
import { DictionaryService } from '../../dictionary/dictionary.service';
import {
  MIN_CHAR_CLASSES,
  MIN_RECOMMENDED_LENGTH,
  RISK_WEIGHTS,
} from '../risk.constants';
import { RiskFactor } from '../types/risk.types';

@Injectable()
export class FeatureExtractorService {
  constructor(private readonly dictionaryService: DictionaryService) {}

  /**
   * Factors are always returned in the same order: length, diversity,
   * sequence, repetition, substitution, dictionary.
   */
  extract(password: string, normalized: NormalizedForms): RiskFactor[] {
    const revealed = this.dictionaryService.findWords(normalized.desubstituted);
    return [
      this.length(password),
      this.diversity(password),
      this.sequence(normalized),
      this.repetition(password),
      this.substitution(normalized, revealed),
      this.dictionary(revealed),
    ];
  }

  private length(password: string): RiskFactor {
    const length = codePointLength(password);
    const triggered = length < MIN_RECOMMENDED_LENGTH;
    return {
      name: 'length',
      kind: 'risk',
      weight: RISK_WEIGHTS.length,
      triggered,
      detail: triggered
        ? `Shorter than the recommended ${MIN_RECOMMENDED_LENGTH} characters (${length})`
        : `Length meets the recommended minimum of ${MIN_RECOMMENDED_LENGTH} characters`,
    };
  }

  private diversity(password: string): RiskFactor {
    const classes = charClasses(password).size;
    const triggered = classes >= MIN_CHAR_CLASSES;
    return {
      name: 'diversity',
      kind: 'protective',
      weight: RISK_WEIGHTS.diversity,
      triggered,
      detail: triggered
        ? `Uses ${classes} character categories`
        : `Limited character variety (${classes} of 4 categories)`,
    };
  }

  private sequence(normalized: NormalizedForms): RiskFactor {
    const triggered = findSequentialRun(normalized.lowercase) !== null;
    return {
      name: 'sequence',
      kind: 'risk',
      weight: RISK_WEIGHTS.sequence,
      triggered,
      detail: triggered
        ? 'Contains sequential or keyboard patterns'
        : 'No sequential or keyboard patterns',
    };
  }

  private repetition(password: string): RiskFactor {
    const triggered = findRepeatedRun(password) !== null;
    return {
      name: 'repetition',
      kind: 'risk',
      weight: RISK_WEIGHTS.repetition,
      triggered,
      detail: triggered
        ? 'Contains a character repeated three or more times in a row'
        : 'No repeated character runs',
    };
  }

  private substitution(
    normalized: NormalizedForms,
    revealed: string[],
  ): RiskFactor {
    const hidden =
      normalized.desubstituted === normalized.lowercase
        ? undefined
        : revealed.find((word) => !normalized.lowercase.includes(word));
    return {
      name: 'substitution',
      kind: 'risk',
      weight: RISK_WEIGHTS.substitution,
      triggered: hidden !== undefined,
      detail:
        hidden !== undefined
          ? `Uses predictable substitutions of the common word "${hidden}"`
          : 'No predictable character substitutions',
    };
  }

  private dictionary(revealed: string[]): RiskFactor {
    const [word] = revealed;
    return {
      name: 'dictionary',
      kind: 'risk',
      weight: RISK_WEIGHTS.dictionary,
      triggered: word !== undefined,
      detail:
        word !== undefined
          ? `Contains the common word "${word}"`
          : 'No common dictionary words',
    };
  }
}
