import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'node:crypto';
import pTimeout from 'p-timeout';
import { AppError } from '../../../common/errors/app.error';
import {
  IRangeProvider,
  RANGE_PROVIDER,
} from '../../../common/interfaces/range-provider.interface';
import {
  HashParts,
  OnlineBreachStatus,
  OnlineLookupOptions,
} from '../types/breach.types';

export const PREFIX_LENGTH = 5;

const RANGE_LINE = /^([0-9A-F]{35}):(\d+)$/i;
const UNCHECKED: OnlineBreachStatus = Object.freeze({
  checked: false,
  hit: false,
});

export function hashPassword(password: string): HashParts {
  const digest = createHash('sha1')
    .update(password, 'utf8')
    .digest('hex')
    .toUpperCase();
  return {
    prefix: digest.slice(0, PREFIX_LENGTH),
    suffix: digest.slice(PREFIX_LENGTH),
  };
}

/** Count recorded for `suffix`, 0 when absent. Throws on a malformed line. */
export function parseRange(body: string, suffix: string): number {
  const wanted = suffix.toUpperCase();
  let count = 0;
  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const match = RANGE_LINE.exec(line);
    if (!match) {
      throw new AppError('Malformed range response', 502, 'MALFORMED_RANGE');
    }
    if (match[1].toUpperCase() === wanted) {
      count = parseInt(match[2], 10);
    }
  }
  return count;
}

@Injectable()
export class OnlineBreachService {
  private readonly logger = new Logger(OnlineBreachService.name);
  private readonly defaultTimeoutMs: number;

  constructor(
    @Inject(RANGE_PROVIDER) private readonly rangeProvider: IRangeProvider,
    private readonly configService: ConfigService,
  ) {
    this.defaultTimeoutMs = this.configService.getOrThrow<number>(
      'app.onlineLookupTimeoutMs',
    );
  }

  /**
   * k-anonymity lookup: only the 5-character SHA-1 prefix is handed to the
   * range provider. Never rejects; failures come back with `checked: false`.
   */
  async lookup(
    password: string,
    options: OnlineLookupOptions = {},
  ): Promise<OnlineBreachStatus> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const { prefix, suffix } = hashPassword(password);

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
      this.logger.debug('Online lookup skipped: request already aborted');
      return UNCHECKED;
    }
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new AppError('Range lookup aborted', 499, 'ABORTED')),
        { once: true },
      );
    });

    try {
      this.logger.debug(`Querying range for prefix ${prefix}`);
      const body = await pTimeout(
        Promise.race([
          this.rangeProvider.fetchRange(prefix, controller.signal),
          aborted,
        ]),
        timeoutMs,
        `Range lookup timed out after ${timeoutMs}ms`,
      );
      const count = parseRange(body, suffix);
      return count > 0
        ? { checked: true, hit: true, count }
        : { checked: true, hit: false, count: 0 };
    } catch (error) {
      controller.abort();
      this.logger.warn(`Online lookup unavailable: ${(error as Error).message}`);
      return UNCHECKED;
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
