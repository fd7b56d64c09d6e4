import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { open } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  normalize,
  NormalizedForms,
} from '../../../common/utils/normalize.utils';

@Injectable()
export class OfflineBreachService {
  private readonly logger = new Logger(OfflineBreachService.name);
  private readonly corpusPaths: string[];
  private corpus: Promise<ReadonlySet<string>> | null = null;

  constructor(private readonly configService: ConfigService) {
    this.corpusPaths = this.configService
      .getOrThrow<string[]>('app.breachCorpusPaths')
      .map((path) => resolve(path));
  }

  /** Loads the corpus on first use; every later caller shares the same set. */
  getCorpus(): Promise<ReadonlySet<string>> {
    if (!this.corpus) {
      this.corpus = this.loadCorpus();
    }
    return this.corpus;
  }

  async isBreachedOffline(normalized: NormalizedForms): Promise<boolean> {
    const corpus = await this.getCorpus();
    return (
      corpus.has(normalized.lowercase) || corpus.has(normalized.desubstituted)
    );
  }

  async contains(password: string): Promise<boolean> {
    return this.isBreachedOffline(normalize(password));
  }

  private async loadCorpus(): Promise<ReadonlySet<string>> {
    const entries = new Set<string>();
    for (const path of this.corpusPaths) {
      const before = entries.size;
      await this.readInto(path, entries);
      this.logger.debug(
        `Read ${entries.size - before} corpus entries from ${path}`,
      );
    }
    this.logger.log(`Offline breach corpus ready with ${entries.size} entries`);
    return entries;
  }

  private async readInto(path: string, entries: Set<string>): Promise<void> {
    try {
      const file = await open(path, 'r');
      try {
        for await (const line of file.readLines({ encoding: 'utf-8' })) {
          const entry = line.trim();
          if (entry && !entry.startsWith('#')) {
            entries.add(entry.toLowerCase());
          }
        }
      } finally {
        await file.close();
      }
    } catch (error) {
      this.logger.warn(
        `Breach corpus ${path} unavailable: ${(error as Error).message}`,
      );
    }
  }
}
