import Groq from 'groq-sdk';
import { groqConfig } from '../../config/services';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  json?: boolean;
}

export interface LlmClient {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export class GroqLlmClient implements LlmClient {
  private groq: Groq | null = null;

  // Created on first use so that importing the module never needs an API key
  private client(): Groq {
    if (!this.groq) {
      this.groq = new Groq({
        apiKey: groqConfig.apiKey,
        timeout: groqConfig.timeoutMs,
        maxRetries: groqConfig.maxRetries,
      });
    }
    return this.groq;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const responseFormat: { type: 'json_object' } | undefined = options.json
      ? { type: 'json_object' }
      : undefined;

    const completion = await this.client().chat.completions.create({
      messages,
      model: groqConfig.model,
      temperature: options.temperature ?? 0.7,
      max_tokens: options.maxTokens ?? 800,
      response_format: responseFormat,
    });

    const response = completion.choices[0]?.message?.content;
    if (!response) {
      throw new Error('No response from LLM');
    }
    return response;
  }
}

export const groqLlmClient = new GroqLlmClient();
