import { Controller, Get, Logger, Query } from '@nestjs/common';
import { IsOptional, IsString } from 'class-validator';
import { ANALYSIS_UNAVAILABLE } from '../analysis/analysis.types';
import { LlmService } from '../analysis/llm.service';
import { toUpstreamError } from '../utils/upstream-error';

export class ChatQueryDto {
  @IsOptional()
  @IsString()
  prompt?: string;
}

export interface ChatResponse {
  model: string;
  prompt: string;
  response: string;
  error?: string;
}

const DEFAULT_PROMPT = 'tell me a short story';

@Controller('chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly llmService: LlmService) {}

  @Get()
  async chat(@Query() query: ChatQueryDto): Promise<ChatResponse> {
    const prompt = query.prompt?.trim() || DEFAULT_PROMPT;
    const model = this.llmService.model;

    try {
      const response = await this.llmService.generate(prompt);
      return { model, prompt, response };
    } catch (error) {
      const upstreamError = toUpstreamError('llm', error);
      this.logger.error(`Chat failed: ${upstreamError.message}`);
      return {
        model,
        prompt,
        response: ANALYSIS_UNAVAILABLE,
        error: upstreamError.message,
      };
    }
  }
}
