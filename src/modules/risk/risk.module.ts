import { Module } from '@nestjs/common';
import { DictionaryModule } from '../dictionary/dictionary.module';
import { FeatureExtractorService } from './services/feature-extractor.service';
import { RiskScorerService } from './services/risk-scorer.service';

@Module({
  imports: [DictionaryModule],
  providers: [FeatureExtractorService, RiskScorerService],
  exports: [FeatureExtractorService, RiskScorerService],
})
export class RiskModule {}
