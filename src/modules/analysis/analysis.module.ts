import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { UtilsModule } from '../utils/utils.module';
import { AnalysisService } from './analysis.service';
import { LlmService } from './llm.service';

@Module({
  imports: [ConfigModule, UtilsModule],
  providers: [LlmService, AnalysisService],
  exports: [LlmService, AnalysisService],
})
export class AnalysisModule {}
