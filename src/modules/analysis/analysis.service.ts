import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheService } from '../utils/cache.service';
import { hashKey } from '../utils/cache-key';
import { toUpstreamError } from '../utils/upstream-error';
import {
  ANALYSIS_UNAVAILABLE,
  AnalysisOptions,
  PromptTemplate,
} from './analysis.types';
import { LlmService } from './llm.service';

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly llmService: LlmService,
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Run `template` over `query` and `data` through the generation backend.
   *
   * Results are cached under a hash of the query and the serialized data.
   * Any upstream failure resolves to {@link ANALYSIS_UNAVAILABLE}, which is
   * never cached.
   */
  async analyze<T>(
    template: PromptTemplate<T>,
    query: string,
    data: T,
    options: AnalysisOptions = {},
  ): Promise<string> {
    const cacheKey = hashKey(`${template.kind}_analysis`, query, data);

    const cached = await this.cacheService.get<string>(cacheKey);
    if (cached !== null) {
      this.logger.debug(`Using cached ${template.kind} analysis`);
      return cached;
    }

    const prompt = template.render(query, data);

    try {
      const analysis = await this.llmService.generate(prompt, options);
      await this.cacheService.set(
        cacheKey,
        analysis,
        this.configService.get<number>('ANALYSIS_CACHE_TTL_SECONDS', 300),
      );
      return analysis;
    } catch (error) {
      const upstreamError = toUpstreamError('llm', error);
      this.logger.error(
        `${template.kind} analysis failed (${upstreamError.kind}): ${upstreamError.message}`,
      );
      return ANALYSIS_UNAVAILABLE;
    }
  }
}
