import type { AppConfig } from '../env';
import { CompletionError, previewBody, readResponseText } from '../errors';
import { fetchWithTimeout } from '../http/fetchWithTimeout';
import { log } from '../log';
import type { ChatMessage, ReplyProvider } from './types';

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
}

export function buildConversation(systemPrompt: string, transcript: string): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: transcript },
  ];
}

export class ChatCompletionClient implements ReplyProvider {
  public readonly id = 'openai_chat_completion';

  constructor(private readonly config: AppConfig['openai']) {}

  public async reply(transcript: string): Promise<string> {
    return fetchWithTimeout(
      `${this.config.baseUrl}/chat/completions`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.config.completionModel,
          messages: buildConversation(this.config.systemPrompt, transcript),
          max_tokens: this.config.completionMaxTokens,
        }),
      },
      this.config.timeoutMs,
      async (response) => {
        if (!response.ok) {
          const body = await readResponseText(response);
          log.error(
            { event: 'completion_http_error', status: response.status, body_preview: previewBody(body) },
            'chat completion request failed',
          );
          throw new CompletionError(response.status, body);
        }

        const data = (await response.json()) as ChatCompletionResponse;
        const content = data.choices?.[0]?.message?.content;
        if (typeof content !== 'string') {
          throw new CompletionError(response.status, 'missing choice content');
        }

        return content.trim();
      },
    );
  }
}
