/**
 * Model service contract
 */

export type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerateOptions {
  temperature: number;
  /** Transport-level budget; `null` leaves the request unbounded */
  timeoutMs: number | null;
  /** Aborted when the caller abandons the request */
  signal?: AbortSignal;
}

export interface ModelClient {
  readonly model: string;
  generate(messages: ChatMessage[], options: GenerateOptions): Promise<string>;
}

export function systemMessage(content: string): ChatMessage {
  return { role: 'system', content };
}

export function userMessage(content: string): ChatMessage {
  return { role: 'user', content };
}

export class ModelServiceError extends Error {
  constructor(
    message: string,
    public model: string,
    public status: number | null = null,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ModelServiceError';
  }
}
