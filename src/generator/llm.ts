import { generateText, APICallError, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { getConfig } from '../config.js';
import { PipelineError, errorMessage, serviceUnavailableError } from '../errors.js';
import { getLogger } from '../utils/logger.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxOutputTokens?: number;
  temperature?: number;
}

/**
 * The one thing the pipeline needs from a language model: prompt in, text out.
 */
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAiTextGeneratorConfig {
  apiKey?: string;
  model?: string;
}

export class OpenAiTextGenerator implements TextGenerator {
  private model: LanguageModel;
  private modelName: string;
  private logger = getLogger().child({ component: 'OpenAiTextGenerator' });

  constructor(config?: OpenAiTextGeneratorConfig) {
    const globalConfig = getConfig();
    const openai = createOpenAI({ apiKey: config?.apiKey ?? globalConfig.OPENAI_API_KEY });
    this.modelName = config?.model ?? globalConfig.OPENAI_MODEL;
    this.model = openai(this.modelName);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const started = Date.now();
    try {
      const { text, usage } = await generateText({
        model: this.model,
        system: request.system,
        prompt: request.prompt,
        maxOutputTokens: request.maxOutputTokens,
        temperature: request.temperature,
        // Retries are owned by the caller's RetryPolicy
        maxRetries: 0,
      });
      this.logger.debug(
        { model: this.modelName, duration_ms: Date.now() - started, usage },
        'Text generation complete'
      );
      return text;
    } catch (err) {
      throw toPipelineError(err);
    }
  }
}

function toPipelineError(err: unknown): PipelineError {
  if (APICallError.isInstance(err)) {
    if (err.isRetryable) {
      return serviceUnavailableError('OpenAI', err.message, err.statusCode);
    }
    return new PipelineError({
      code: 'GENERATION_FAILED',
      message: `OpenAI request rejected: ${err.message}`,
      status: err.statusCode,
    });
  }
  return serviceUnavailableError('OpenAI', errorMessage(err));
}
