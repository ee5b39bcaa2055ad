// OpenRouter Service
// Remote embeddings and cluster titles through the OpenRouter API

import axios from 'axios';
import { z } from 'zod';
import logger from './logger';
import { EmbeddingFailureError } from './errors';
import { EmbeddingProvider } from './embedding-provider';
import { HttpPoster, ResilientApiClient } from './resilient-api-client';
import { Config, EmbeddingVector } from './types';

type OpenRouterConfig = Config['openrouter'];

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

const ChatResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
});

const MAX_EMBEDDING_INPUT_CHARS = 8000;
const TITLE_SAMPLE_SIZE = 5;
const TITLE_SNIPPET_CHARS = 150;
const EXPLAIN_SAMPLE_SIZE = 10;
const EXPLAIN_SNIPPET_CHARS = 200;
const EXPLAIN_ERROR_CHARS = 200;

export const EXPLAIN_NOT_CONFIGURED = 'OpenRouter API key not configured. Set OPENROUTER_API_KEY to ask about clusters.';
export const EXPLAIN_RATE_LIMITED = 'Rate limit reached. Please wait a moment and try again.';
export const EXPLAIN_NO_SIGNALS = 'This cluster has no signals to explain.';

function safeErrorMessage(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return [
      error.response?.status ? `HTTP ${error.response.status}` : null,
      error.code ? `code=${error.code}` : null,
      `msg=${error.message}`,
    ].filter(Boolean).join(' ');
  }
  return error instanceof Error ? error.message : String(error);
}

function isRateLimited(error: unknown): boolean {
  if (axios.isAxiosError(error) && error.response?.status === 429) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('429') || message.toLowerCase().includes('quota');
}

export function buildTitlePrompt(texts: string[]): string {
  const sample = texts
    .slice(0, TITLE_SAMPLE_SIZE)
    .map(text => `- ${text.slice(0, TITLE_SNIPPET_CHARS)}`)
    .join('\n');

  return `Analyze these signals and write one clear title describing the trend that is emerging.

Signals:
${sample}

Requirements:
- At most 8-10 words
- Plain, non-technical language
- Describe the trend, not a list of keywords

Output ONLY the title.`;
}

export function buildExplanationPrompt(texts: string[], question: string): string {
  const sample = texts
    .slice(0, EXPLAIN_SAMPLE_SIZE)
    .map(text => `- ${text.slice(0, EXPLAIN_SNIPPET_CHARS)}`)
    .join('\n');

  return `Cluster signals:
${sample}

Question: ${question}

Answer from the signals above only.`;
}

export class OpenRouterService {
  private readonly http: HttpPoster;

  constructor(private readonly config: OpenRouterConfig, http?: HttpPoster) {
    this.http = http ?? new ResilientApiClient({
      name: 'openrouter',
      baseURL: config.baseUrl,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'X-Title': 'trendwatch',
      },
    });
  }

  canUseService(): boolean {
    return this.config.apiKey.length > 0 && this.config.apiKey !== 'your-api-key-here';
  }

  /**
   * Embed one text with the configured embedding model.
   * Every failure surfaces as {@link EmbeddingFailureError}.
   */
  async generateEmbedding(text: string): Promise<EmbeddingVector> {
    if (!this.canUseService()) {
      throw new EmbeddingFailureError('OpenRouter API key not configured', { textLength: text.length });
    }
    if (text.trim().length === 0) {
      throw new EmbeddingFailureError('Cannot embed blank text', { textLength: text.length });
    }

    let body: unknown;
    try {
      body = await this.http.post<unknown>('/embeddings', {
        model: this.config.embeddingModel,
        input: text.substring(0, MAX_EMBEDDING_INPUT_CHARS),
      });
    } catch (error) {
      throw new EmbeddingFailureError(`OpenRouter embedding request failed: ${safeErrorMessage(error)}`, {
        cause: error,
        textLength: text.length,
      });
    }

    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingFailureError('Unexpected embedding response format', { textLength: text.length });
    }

    const embedding = parsed.data.data[0].embedding;
    if (embedding.length === 0) {
      throw new EmbeddingFailureError('OpenRouter returned an empty embedding', { textLength: text.length });
    }
    return embedding;
  }

  /**
   * Ask the labeling model for a short cluster title. Returns null on any
   * failure; the caller decides on a fallback.
   */
  async generateClusterTitle(texts: string[]): Promise<string | null> {
    if (!this.canUseService() || texts.length === 0) {
      return null;
    }

    try {
      const body = await this.http.post<unknown>('/chat/completions', {
        model: this.config.labelingModel,
        messages: [
          { role: 'system', content: 'You name emerging trends for a general audience. Reply with the title only.' },
          { role: 'user', content: buildTitlePrompt(texts) },
        ],
        temperature: 0.2,
        max_tokens: 40,
      });

      const parsed = ChatResponseSchema.safeParse(body);
      const content = parsed.success ? parsed.data.choices[0]?.message.content : null;
      const title = content?.trim().replace(/^["']|["']$/g, '').trim();

      if (!title) {
        logger.warn('[OpenRouter] Unexpected title response format');
        return null;
      }
      return title;
    } catch (error) {
      logger.debug(`[OpenRouter] Title generation failed: ${safeErrorMessage(error)}`);
      return null;
    }
  }

  /**
   * Answer a question about a cluster from its first ten signals.
   * Never throws: failures come back as a readable message. Throttling is
   * retried by the HTTP client before it is reported here.
   */
  async explainCluster(texts: string[], question: string): Promise<string> {
    if (!this.canUseService()) {
      return EXPLAIN_NOT_CONFIGURED;
    }
    if (texts.length === 0) {
      return EXPLAIN_NO_SIGNALS;
    }

    try {
      const body = await this.http.post<unknown>('/chat/completions', {
        model: this.config.labelingModel,
        messages: [
          {
            role: 'system',
            content: 'You explain emerging trends to a non-technical audience. Use simple language, stay factual and ' +
              'grounded in the evidence given, avoid hype and speculation, and answer in two or three sentences.',
          },
          { role: 'user', content: buildExplanationPrompt(texts, question) },
        ],
        temperature: 0.3,
        max_tokens: 300,
      });

      const parsed = ChatResponseSchema.safeParse(body);
      const answer = parsed.success ? parsed.data.choices[0]?.message.content?.trim() : undefined;
      if (!answer) {
        logger.warn('[OpenRouter] Unexpected explanation response format');
        return 'Error generating explanation: empty response';
      }
      return answer;
    } catch (error) {
      if (isRateLimited(error)) {
        logger.warn('[OpenRouter] Explanation rate limited');
        return EXPLAIN_RATE_LIMITED;
      }
      const message = safeErrorMessage(error);
      logger.error(`[OpenRouter] Explanation failed: ${message}`);
      return `Error generating explanation: ${message.slice(0, EXPLAIN_ERROR_CHARS)}`;
    }
  }
}

export class OpenRouterEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openrouter';

  constructor(private readonly service: OpenRouterService) {}

  embed(text: string): Promise<EmbeddingVector> {
    return this.service.generateEmbedding(text);
  }
}
