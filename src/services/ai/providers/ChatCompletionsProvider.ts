import BaseProvider from './BaseProvider';
import { extractMessageContent, parseModelContent } from '../utils/ResponseValidator';
import {
  failure,
  success,
  type BackendResult,
  type BaseProviderConfig,
  type BuiltPrompt,
  type ChatCompletionRequest,
  type CompletionBackend,
  type Outcome,
} from '../types';

/**
 * OpenAI-compatible chat completions backend ({baseUrl}/chat/completions).
 */
export class ChatCompletionsProvider extends BaseProvider<BaseProviderConfig> implements CompletionBackend {
  constructor(config: BaseProviderConfig, name = 'nim') {
    super(name, config);
  }

  public get model(): string {
    return this.config.model;
  }

  public async complete(prompt: BuiltPrompt, apiKey: string): Promise<Outcome<BackendResult>> {
    const content = await this.completeText(prompt, apiKey);
    if (!content.ok) return content;
    return parseModelContent(this.name, prompt.requestType, content.value);
  }

  public async completeText(prompt: BuiltPrompt, apiKey: string): Promise<Outcome<string>> {
    const body: ChatCompletionRequest = {
      model: this.config.model,
      messages: prompt.messages,
      max_tokens: prompt.maxTokens,
      temperature: prompt.temperature,
    };

    const res = await this.postJson('/chat/completions', body, apiKey);
    if (!res.ok) return res;
    return extractMessageContent(this.name, res.value);
  }

  /**
   * One-token request; any 2xx with a well-formed envelope counts as healthy.
   */
  public async healthCheck(apiKey: string): Promise<Outcome<void>> {
    const body: ChatCompletionRequest = {
      model: this.config.model,
      messages: [{ role: 'user', content: 'ping' }],
      max_tokens: 1,
      temperature: 0,
    };
    const res = await this.postJson('/chat/completions', body, apiKey);
    if (!res.ok) return res;
    const content = extractMessageContent(this.name, res.value);
    return content.ok ? success(undefined) : failure(content.error);
  }
}

export default ChatCompletionsProvider;
