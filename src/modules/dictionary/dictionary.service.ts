import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export const MIN_WORD_LENGTH = 4;

@Injectable()
export class DictionaryService {
  private readonly logger = new Logger(DictionaryService.name);
  private readonly wordlistPath: string;
  private words: readonly string[] | null = null;

  constructor(private readonly configService: ConfigService) {
    this.wordlistPath = resolve(
      this.configService.getOrThrow<string>('app.wordlistPath'),
    );
  }

  getWords(): readonly string[] {
    if (!this.words) {
      this.words = Object.freeze(this.load());
    }
    return this.words;
  }

  /** Bundled words contained in `text`, longest first. */
  findWords(text: string): string[] {
    if (text.length < MIN_WORD_LENGTH) return [];
    return this.getWords()
      .filter((word) => text.includes(word))
      .sort((a, b) => b.length - a.length);
  }

  private load(): string[] {
    try {
      const words = readFileSync(this.wordlistPath, 'utf-8')
        .split(/\r?\n/)
        .map((line) => line.trim().toLowerCase())
        .filter(
          (line) => line.length >= MIN_WORD_LENGTH && !line.startsWith('#'),
        );
      const unique = [...new Set(words)];
      this.logger.log(`Loaded ${unique.length} dictionary words`);
      return unique;
    } catch (error) {
      this.logger.warn(
        `Wordlist ${this.wordlistPath} unavailable: ${(error as Error).message}`,
      );
      return [];
    }
  }
}
