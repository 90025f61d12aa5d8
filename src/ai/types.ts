export interface ReplyProvider {
  readonly id: string;
  reply(transcript: string): Promise<string>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
