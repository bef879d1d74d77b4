import OpenAI from 'openai';
import type { SchemaNormalizer, SchemaProposal } from '@tabingest/core';
import { AIProcessingError, IngestionError } from '@tabingest/core';
import type { ChatClient } from './ChatClient.js';
import { openAIChatClient } from './ChatClient.js';
import { SYSTEM_PROMPT, userPrompt } from './prompts.js';
import { aiResponseSchema, toProposal } from './proposal.js';
import type { OpenAISettings } from './settings.js';
import { DEFAULT_MODEL } from './settings.js';

export interface OpenAISchemaNormalizerOptions {
  /** Default: `'gpt-4.1-nano'`. */
  readonly model?: string;
  /** Default: `0.1`. */
  readonly temperature?: number;
  /** Default: `1000`. */
  readonly maxTokens?: number;
}

/**
 * SchemaNormalizer backed by an OpenAI chat model in JSON mode.
 *
 * Sends the column labels once and maps the answer onto a `SchemaProposal`.
 * Transport failures and unusable answers raise `AIProcessingError`, which the
 * engine retries; a rejected API key does not.
 *
 * @example
 * ```typescript
 * const normalizer = OpenAISchemaNormalizer.fromSettings(loadOpenAISettings());
 * const engine = new IngestionEngine({ normalizer });
 * const schema = await engine.proposeSchema('Customers', await rows.columns());
 * ```
 */
export class OpenAISchemaNormalizer implements SchemaNormalizer {
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly client: ChatClient,
    options: OpenAISchemaNormalizerOptions = {},
  ) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  static fromSettings(settings: OpenAISettings): OpenAISchemaNormalizer {
    // retries belong to the engine
    const client = new OpenAI({ apiKey: settings.apiKey, timeout: settings.timeoutMs, maxRetries: 0 });
    return new OpenAISchemaNormalizer(openAIChatClient(client), { model: settings.model });
  }

  async propose(labels: readonly string[]): Promise<SchemaProposal> {
    let content: string | null;
    try {
      content = await this.client.complete({
        model: this.model,
        system: SYSTEM_PROMPT,
        user: userPrompt(labels),
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
    } catch (error) {
      if (error instanceof IngestionError) throw error;
      throw new AIProcessingError('The AI service request failed', { cause: error });
    }

    if (!content) {
      throw new AIProcessingError('The AI service returned an empty response');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new AIProcessingError('The AI response is not valid JSON', { cause: error });
    }

    const result = aiResponseSchema.safeParse(parsed);
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new AIProcessingError(`The AI response does not describe a schema (${details})`, { cause: result.error });
    }

    return toProposal(labels, result.data);
  }
}
