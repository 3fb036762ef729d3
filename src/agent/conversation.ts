import type { ChatMessage, ConversationTurn } from './types.js';

/**
 * Ordered history of completed exchanges
 */
export class Conversation {
  private readonly turns: ConversationTurn[] = [];
  private readonly systemPrompt?: string;

  constructor(systemPrompt?: string) {
    this.systemPrompt = systemPrompt;
  }

  record(turn: ConversationTurn): void {
    this.turns.push(turn);
  }

  getTurns(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  get length(): number {
    return this.turns.length;
  }

  clear(): void {
    this.turns.length = 0;
  }

  /**
   * Messages for the next request: system prompt, every previous turn, then the new user message
   */
  toMessages(nextUserMessage: string): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (this.systemPrompt) {
      messages.push({ role: 'system', content: this.systemPrompt });
    }
    for (const turn of this.turns) {
      messages.push({ role: 'user', content: turn.user });
      messages.push({ role: 'assistant', content: turn.assistant });
    }
    messages.push({ role: 'user', content: nextUserMessage });
    return messages;
  }
}
