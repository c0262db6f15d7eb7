/**
 * Conversation Types
 *
 * History is owned by the caller. Everything in the pipeline reads it
 * through ReadonlyArray and builds copies.
 */

export type TurnRole = 'user' | 'assistant' | 'system';

export interface ConversationTurn {
  role: TurnRole;
  content: string;

  /** Domain the turn was asked against, when the caller tracks it */
  domain?: string;
}

export type ConversationHistory = ReadonlyArray<Readonly<ConversationTurn>>;

/**
 * Pluggable token counter. The default is js-tiktoken backed.
 */
export interface Tokenizer {
  count(text: string): number;
}
