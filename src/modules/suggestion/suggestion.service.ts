import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomInt } from 'node:crypto';
import { normalize } from '../../common/utils/normalize.utils';
import {
  charClasses,
  codePointLength,
  findRepeatedRun,
  findSequentialRun,
  isRunTriple,
} from '../../common/utils/password.utils';
import { OfflineBreachService } from '../breach-check/services/offline-breach.service';
import { DictionaryService } from '../dictionary/dictionary.service';
import { MIN_CHAR_CLASSES, MIN_RECOMMENDED_LENGTH } from '../risk/risk.constants';

export const WORD_BANK = [
  'orbit',
  'cobalt',
  'harbor',
  'falcon',
  'ember',
  'sage',
  'vivid',
  'meadow',
  'glacier',
  'lantern',
  'thistle',
  'copper',
  'willow',
  'cinder',
  'marble',
  'quartz',
  'juniper',
  'saffron',
  'tundra',
  'nimbus',
];

const LOWER = 'abcdefghijkmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHJKLMNPQRSTUVWXYZ';
const DIGITS = '0123456789';
const SYMBOLS = '!@#$%&*?';
const ALL = LOWER + UPPER + DIGITS + SYMBOLS;

const STEM_LENGTH = 3;
const FALLBACK_LENGTH = 16;
const FALLBACK_ATTEMPTS = 10;

export function meetsStrengthConstraints(candidate: string): boolean {
  return (
    codePointLength(candidate) >= MIN_RECOMMENDED_LENGTH &&
    charClasses(candidate).size >= MIN_CHAR_CLASSES &&
    findSequentialRun(candidate) === null &&
    findRepeatedRun(candidate) === null
  );
}

/** First window of the word that is itself free of runs and repeats. */
export function stemOf(word: string): string | undefined {
  const chars = [...word];
  for (let i = 0; i + STEM_LENGTH <= chars.length; i++) {
    const window = chars.slice(i, i + STEM_LENGTH).join('');
    if (findSequentialRun(window) === null && findRepeatedRun(window) === null) {
      return window;
    }
  }
  return undefined;
}

function pick<T>(items: ArrayLike<T>): T {
  return items[randomInt(items.length)];
}

function shuffle<T>(items: T[]): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

@Injectable()
export class SuggestionService {
  private readonly logger = new Logger(SuggestionService.name);
  private readonly maxAttempts: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly dictionaryService: DictionaryService,
    private readonly offlineBreachService: OfflineBreachService,
  ) {
    this.maxAttempts = this.configService.getOrThrow<number>(
      'app.suggestionMaxAttempts',
    );
  }

  /**
   * Themed candidates are built around a run-free stem of the word detected
   * in the input (or a word-bank entry) and retried up to `maxAttempts` times before
   * falling back to a random password.
   */
  async generate(password: string, count = 3): Promise<string[]> {
    const [detected] = this.dictionaryService.findWords(
      normalize(password).desubstituted,
    );
    const stem = detected === undefined ? undefined : stemOf(detected);
    const taken = new Set<string>([password]);
    const suggestions: string[] = [];

    for (let i = 0; i < count; i++) {
      const suggestion =
        (await this.themed(stem, taken)) ?? (await this.fallback(taken));
      taken.add(suggestion);
      suggestions.push(suggestion);
    }
    return suggestions;
  }

  private async themed(
    stem: string | undefined,
    taken: Set<string>,
  ): Promise<string | null> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = this.compose(stem);
      if (await this.isAcceptable(candidate, taken)) return candidate;
    }
    this.logger.debug(
      `No themed suggestion after ${this.maxAttempts} attempts, using random fallback`,
    );
    return null;
  }

  private async fallback(taken: Set<string>): Promise<string> {
    let candidate = this.randomStrong(FALLBACK_LENGTH);
    for (let attempt = 0; attempt < FALLBACK_ATTEMPTS; attempt++) {
      if (await this.isAcceptable(candidate, taken)) return candidate;
      candidate = this.randomStrong(FALLBACK_LENGTH);
    }
    // randomStrong output always meets the strength rules; only the corpus check is dropped
    while (taken.has(candidate)) {
      candidate = this.randomStrong(FALLBACK_LENGTH);
    }
    this.logger.warn(
      `No random suggestion passed the breach corpus after ${FALLBACK_ATTEMPTS} attempts`,
    );
    return candidate;
  }

  private compose(stem: string | undefined): string {
    const parts = [
      stem ? this.varyCase(stem) : '',
      this.varyCase(pick(WORD_BANK)),
      pick(SYMBOLS),
      pick(DIGITS),
      pick(DIGITS),
    ];
    let candidate = parts.join('');
    while (candidate.length < MIN_RECOMMENDED_LENGTH) {
      candidate += pick(SYMBOLS + DIGITS);
    }
    return candidate;
  }

  private varyCase(word: string): string {
    const chars = [...word.toLowerCase()];
    chars[0] = chars[0].toUpperCase();
    if (chars.length > 1 && randomInt(2) === 1) {
      const index = 1 + randomInt(chars.length - 1);
      chars[index] = chars[index].toUpperCase();
    }
    return chars.join('');
  }

  /** Seeds one character of each class, then never appends a character that would finish a run. */
  private randomStrong(length: number): string {
    const pools = [
      ...shuffle([LOWER, UPPER, DIGITS, SYMBOLS]),
      ...Array<string>(length - 4).fill(ALL),
    ];
    const chars: string[] = [];
    for (const pool of pools) {
      const allowed = [...pool].filter(
        (char) => !this.completesPattern(chars, char),
      );
      chars.push(pick(allowed));
    }
    return chars.join('');
  }

  private completesPattern(chars: string[], next: string): boolean {
    if (chars.length < 2) return false;
    const [a, b] = chars.slice(-2);
    return (a === b && b === next) || isRunTriple(a, b, next);
  }

  private async isAcceptable(
    candidate: string,
    taken: Set<string>,
  ): Promise<boolean> {
    return (
      !taken.has(candidate) &&
      meetsStrengthConstraints(candidate) &&
      !(await this.offlineBreachService.contains(candidate))
    );
  }
}
