import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { toUpstreamError } from '../utils/upstream-error';
import {
  NO_ANALYSIS,
  OllamaGenerateRequest,
  OllamaGenerateResponse,
  OllamaTagsResponse,
} from './analysis.types';

const STATUS_TIMEOUT_MS = 5000;

/**
 * Client for the text generation backend (`/api/generate`).
 * Errors are rethrown as UpstreamError; callers pick the fallback.
 */
@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);

  constructor(private readonly configService: ConfigService) {}

  get model(): string {
    return this.configService.get<string>('OLLAMA_MODEL', 'gemma2:2b');
  }

  private get baseUrl(): string {
    return this.configService.get<string>('OLLAMA_URL', 'http://localhost:11434');
  }

  async generate(
    prompt: string,
    options: { model?: string; timeoutMs?: number } = {},
  ): Promise<string> {
    const body: OllamaGenerateRequest = {
      model: options.model ?? this.model,
      prompt,
      stream: false,
    };
    const timeout =
      options.timeoutMs ??
      this.configService.get<number>('LLM_TIMEOUT_MS', 30000);

    try {
      const response = await axios.post<OllamaGenerateResponse>(
        `${this.baseUrl}/api/generate`,
        body,
        { timeout },
      );
      const text = response.data?.response;
      this.logger.debug(
        `Generated ${typeof text === 'string' ? text.length : 0} characters with ${body.model}`,
      );
      return typeof text === 'string' ? text : NO_ANALYSIS;
    } catch (error) {
      throw toUpstreamError('llm', error);
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await axios.get<OllamaTagsResponse>(
        `${this.baseUrl}/api/tags`,
        { timeout: STATUS_TIMEOUT_MS },
      );
      return (response.data?.models ?? []).map((model) => model.name);
    } catch (error) {
      throw toUpstreamError('llm', error);
    }
  }

  async isReachable(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch (error) {
      this.logger.debug(
        `Generation backend not reachable: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
