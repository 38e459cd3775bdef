/**
 * Explanation text generation through the Anthropic Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { GenerationSettings } from '../config/recommender-config.js';
import type { Query, RetrievalResult } from '../retrieval/types.js';
import { GenerationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { buildExplanationPrompt } from './prompt-builder.js';

const log = createLogger('explanation-generator');

export interface ExplanationRequest {
  query: Query;
  /** Retrieved records: the only grounding context the model gets. */
  results: RetrievalResult[];
}

export interface ExplanationGenerator {
  generate(request: ExplanationRequest, signal: AbortSignal): Promise<string>;
}

/**
 * Rate limiter for API calls. Each caller reserves its slot before sleeping,
 * so concurrent callers are spaced `minIntervalMs` apart.
 */
class RateLimiter {
  private nextSlot = 0;
  private readonly minIntervalMs: number;

  constructor(callsPerMinute: number) {
    this.minIntervalMs = (60 * 1000) / callsPerMinute;
  }

  async wait(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    if (slot > now) {
      await new Promise((resolve) => setTimeout(resolve, slot - now));
    }
  }
}

export class AnthropicExplanationGenerator implements ExplanationGenerator {
  private client: Anthropic | null;
  private readonly rateLimiter: RateLimiter;

  /**
   * @param client - Preconfigured client. When omitted one is created on first
   *   use from ANTHROPIC_API_KEY.
   */
  constructor(
    private readonly settings: GenerationSettings,
    client?: Anthropic,
  ) {
    this.client = client ?? null;
    this.rateLimiter = new RateLimiter(settings.rateLimitPerMin);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!process.env.ANTHROPIC_API_KEY) {
        throw new GenerationError(
          'No Anthropic API key found. Set the ANTHROPIC_API_KEY environment variable.',
          'NO_API_KEY',
        );
      }
      this.client = new Anthropic();
    }
    return this.client;
  }

  /**
   * @throws GenerationError `NO_API_KEY` | `GENERATION_FAILED` | `EMPTY_RESPONSE`
   */
  async generate(request: ExplanationRequest, signal: AbortSignal): Promise<string> {
    const client = this.getClient();
    const prompt = buildExplanationPrompt(request.query, request.results);

    await this.rateLimiter.wait();

    let response: Anthropic.Message;
    try {
      response = await client.messages.create(
        {
          model: this.settings.model,
          max_tokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          system: this.settings.systemPrompt,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal },
      );
    } catch (error) {
      throw new GenerationError(`Explanation request failed: ${errorMessage(error)}`, 'GENERATION_FAILED', error);
    }

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    text = text.trim();
    if (text.length === 0) {
      throw new GenerationError('Explanation response contained no text', 'EMPTY_RESPONSE');
    }

    log.debug('Explanation generated', {
      model: this.settings.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });
    return text;
  }
}
