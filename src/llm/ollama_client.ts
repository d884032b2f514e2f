/**
 * Ollama chat client
 * One non-streaming /api/chat call per generate(); retries belong to the caller
 */

import { createChildLogger } from '@/utils/logger';
import { ModelServiceError, type ChatMessage, type GenerateOptions, type ModelClient } from './types';

const logger = createChildLogger('ollama_client');

export interface OllamaClientSettings {
  baseUrl: string;
  model: string;
}

interface OllamaChatResponse {
  message?: { role?: string; content?: unknown };
  done?: boolean;
}

function isChatResponse(value: unknown): value is OllamaChatResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class OllamaChatClient implements ModelClient {
  readonly model: string;
  private readonly baseUrl: string;
  private requestCount = 0;

  constructor(settings: OllamaClientSettings) {
    this.model = settings.model;
    this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async generate(messages: ChatMessage[], options: GenerateOptions): Promise<string> {
    if (options.signal?.aborted) {
      throw new ModelServiceError('Request aborted before dispatch', this.model);
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    const timer =
      options.timeoutMs !== null
        ? setTimeout(
            () => controller.abort(new Error(`Transport timeout after ${options.timeoutMs}ms`)),
            options.timeoutMs
          )
        : null;

    try {
      this.requestCount++;
      logger.debug({ model: this.model, messageCount: messages.length }, 'Dispatching chat request');

      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/api/chat`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: this.model,
            messages,
            stream: false,
            options: { temperature: options.temperature },
          }),
          signal: controller.signal,
        });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new ModelServiceError(`Ollama request failed: ${cause.message}`, this.model, null, cause);
      }

      if (!response.ok) {
        throw new ModelServiceError(
          `Ollama API error: ${response.status} ${response.statusText}`,
          this.model,
          response.status
        );
      }

      const body: unknown = await response.json();
      const content = isChatResponse(body) ? body.message?.content : undefined;
      if (typeof content !== 'string' || content.trim() === '') {
        throw new ModelServiceError('Ollama returned an empty response', this.model, response.status);
      }
      return content;
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
