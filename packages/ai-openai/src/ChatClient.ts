import OpenAI from 'openai';
import { IngestionError } from '@tabingest/core';

export interface ChatRequest {
  readonly model: string;
  readonly system: string;
  readonly user: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

/** One JSON-mode chat completion. Resolves with the message content, or `null` when there is none. */
export interface ChatClient {
  complete(request: ChatRequest): Promise<string | null>;
}

/**
 * ChatClient over the OpenAI SDK.
 *
 * A rejected API key is raised as a non-retryable `IngestionError`; every other
 * failure is left for the caller to classify.
 */
export function openAIChatClient(client: OpenAI): ChatClient {
  return {
    async complete(request) {
      try {
        const completion = await client.chat.completions.create({
          model: request.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          response_format: { type: 'json_object' },
        });
        return completion.choices[0]?.message.content ?? null;
      } catch (error) {
        if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
          throw new IngestionError('AI_AUTH_FAILED', 'The AI service rejected the API key', {}, { cause: error });
        }
        throw error;
      }
    },
  };
}
