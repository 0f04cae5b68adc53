import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { LlmConfig } from '../../common/config/llm.config';
import { LlmUnavailableError } from './llm.errors';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  /** Ask the model for a JSON object */
  json?: boolean;
}

@Injectable()
export class LlmService implements OnModuleInit {
  private openai: OpenAI | null = null;
  private readonly logger = new Logger(LlmService.name);
  private readonly config: LlmConfig;

  constructor(configService: ConfigService) {
    const config = configService.get<LlmConfig>('llm');
    if (!config) {
      throw new Error('LLM configuration not found');
    }
    this.config = config;
  }

  onModuleInit() {
    if (this.config.openaiApiKey) {
      this.openai = new OpenAI({
        apiKey: this.config.openaiApiKey,
        timeout: this.config.timeoutMs,
        maxRetries: 1,
      });
      this.logger.log(`OpenAI client initialized (model: ${this.config.model})`);
    } else {
      this.logger.warn('OpenAI API key not configured, LLM features will use fallbacks');
    }
  }

  get isConfigured(): boolean {
    return this.openai !== null;
  }

  get contextMaxLength(): number {
    return this.config.chatContextMaxLength;
  }

  /**
   * Single-turn completion. Returns the trimmed text of the first choice.
   */
  async complete(request: CompletionRequest): Promise<string> {
    if (!this.openai) {
      throw new LlmUnavailableError('OpenAI API key not configured');
    }

    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`LLM completion failed: ${message}`);
      throw new LlmUnavailableError(`LLM completion failed: ${message}`, error);
    }

    const text = content?.trim();
    if (!text) {
      throw new LlmUnavailableError('LLM returned an empty completion');
    }
    return text;
  }
}
