import { Injectable, Logger } from '@nestjs/common';
import { AppError } from '../../common/errors/app.error';
import { normalize } from '../../common/utils/normalize.utils';
import { OfflineBreachService } from '../breach-check/services/offline-breach.service';
import { OnlineBreachService } from '../breach-check/services/online-breach.service';
import {
  BreachResult,
  OnlineBreachStatus,
} from '../breach-check/types/breach.types';
import { FeatureExtractorService } from '../risk/services/feature-extractor.service';
import { RiskScorerService } from '../risk/services/risk-scorer.service';
import { SuggestionService } from '../suggestion/suggestion.service';
import {
  analysisRequestSchema,
  DEFAULT_SUGGESTION_COUNT,
} from './analysis.schema';
import {
  AnalysisReport,
  AnalysisRequest,
  AnalysisResult,
} from './types/analysis.types';

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly featureExtractor: FeatureExtractorService,
    private readonly riskScorer: RiskScorerService,
    private readonly offlineBreachService: OfflineBreachService,
    private readonly onlineBreachService: OnlineBreachService,
    private readonly suggestionService: SuggestionService,
  ) {}

  async analyze(input: unknown): Promise<AnalysisResult> {
    const request = this.validate(input);
    const { password } = request;

    const normalized = normalize(password);
    const factors = this.featureExtractor.extract(password, normalized);
    const offlineHit =
      await this.offlineBreachService.isBreachedOffline(normalized);

    let online: OnlineBreachStatus | null = null;
    if (request.enableOnline) {
      online = await this.onlineBreachService.lookup(password, {
        timeoutMs: request.timeoutMs,
        signal: request.signal,
      });
    }

    const breach: BreachResult = {
      offlineHit,
      onlineHit: online?.hit ?? false,
      onlineChecked: online?.checked ?? false,
      ...(online?.count !== undefined ? { onlineCount: online.count } : {}),
    };

    const assessment = this.riskScorer.score(
      factors,
      { offlineHit: breach.offlineHit, onlineHit: breach.onlineHit },
      breach.onlineCount,
    );
    if (online && !online.hit) {
      assessment.reasons.push(
        online.checked
          ? 'Not found in the online breach database'
          : 'Online breach lookup unavailable',
      );
    }

    const suggestions = await this.suggestionService.generate(
      password,
      request.suggestionCount ?? DEFAULT_SUGGESTION_COUNT,
    );

    this.logger.debug(
      `Analysis finished: label=${assessment.label} score=${assessment.riskScore} offline=${offlineHit} online=${online ? `${online.checked}/${online.hit}` : 'skipped'}`,
    );

    return Object.freeze({
      password,
      riskScore: assessment.riskScore,
      label: assessment.label,
      reasons: Object.freeze(assessment.reasons),
      suggestions: Object.freeze(suggestions),
      breach: Object.freeze(breach),
    });
  }

  toReport(result: AnalysisResult): AnalysisReport {
    const { breach } = result;
    return {
      password: result.password,
      risk_score: result.riskScore,
      label: result.label,
      reasons: [...result.reasons],
      suggestions: [...result.suggestions],
      breached_offline: breach.offlineHit,
      breached_online: breach.onlineChecked ? breach.onlineHit : null,
      ...(breach.onlineHit && breach.onlineCount !== undefined
        ? { hibp_count: breach.onlineCount }
        : {}),
    };
  }

  private validate(input: unknown): AnalysisRequest {
    const { value, error } = analysisRequestSchema.validate(input, {
      abortEarly: false,
    });
    if (error) {
      this.logger.warn(`Rejected analysis request: ${error.message}`);
      throw new AppError(
        `Invalid analysis request: ${error.message}`,
        400,
        'INVALID_REQUEST',
      );
    }
    return value;
  }
}
