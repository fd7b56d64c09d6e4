import { Module } from '@nestjs/common';
import { BreachCheckModule } from '../breach-check/breach-check.module';
import { DictionaryModule } from '../dictionary/dictionary.module';
import { SuggestionService } from './suggestion.service';

@Module({
  imports: [DictionaryModule, BreachCheckModule],
  providers: [SuggestionService],
  exports: [SuggestionService],
})
export class SuggestionModule {}
