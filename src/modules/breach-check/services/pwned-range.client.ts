import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { AppError } from '../../../common/errors/app.error';
import { IRangeProvider } from '../../../common/interfaces/range-provider.interface';

const PREFIX_PATTERN = /^[0-9A-F]{5}$/i;

@Injectable()
export class PwnedRangeClient implements IRangeProvider {
  private readonly logger = new Logger(PwnedRangeClient.name);
  private readonly apiUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.apiUrl = this.configService
      .getOrThrow<string>('app.pwnedRangeApiUrl')
      .replace(/\/+$/, '');
  }

  /** The request is bounded by the caller's `signal`, not by a timeout of its own. */
  async fetchRange(prefix: string, signal?: AbortSignal): Promise<string> {
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new AppError(
        'Range prefix must be 5 hexadecimal characters',
        400,
        'INVALID_PREFIX',
      );
    }

    try {
      const response = await firstValueFrom(
        this.httpService.get<string>(
          `${this.apiUrl}/${prefix.toUpperCase()}`,
          {
            headers: {
              'User-Agent': 'password-risk-engine/1.0',
              'Add-Padding': 'true',
              Accept: 'text/plain',
            },
            responseType: 'text',
            signal,
          },
        ),
      );
      return response.data;
    } catch (error) {
      this.logger.warn(
        `Range request for ${prefix} failed: ${(error as Error).message}`,
      );
      throw new AppError(
        `Range API error: ${(error as Error).message}`,
        502,
        'RANGE_API_ERROR',
      );
    }
  }
}
