import { Module } from '@nestjs/common';
import { BreachCheckModule } from '../breach-check/breach-check.module';
import { RiskModule } from '../risk/risk.module';
import { SuggestionModule } from '../suggestion/suggestion.module';
import { AnalysisService } from './analysis.service';

@Module({
  imports: [RiskModule, BreachCheckModule, SuggestionModule],
  providers: [AnalysisService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
