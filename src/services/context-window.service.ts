/**
 * Context Window Manager
 *
 * Keeps the message list of a single completion request inside a token
 * budget. System turns are never dropped; the remaining turns are kept
 * newest-first and a marker turn records how much survived.
 *
 * Token counts come from js-tiktoken so they track what the provider
 * charges. A Tokenizer can be injected for other models or for tests.
 */

import { getEncoding, type TiktokenEncoding } from 'js-tiktoken';

import { createLogger } from '@/lib/logger.js';
import type {
  ConversationHistory,
  ConversationTurn,
  Tokenizer,
} from '@/types/index.js';

const log = createLogger('context-window');

/**
 * Structural overhead the provider charges per message
 */
export const MESSAGE_OVERHEAD_TOKENS = 4;

export const DEFAULT_CONTEXT_BUDGET = 120000;

export interface ContextWindowManagerConfig {
  /** Maximum tokens for one request's message list */
  budget?: number;

  /** Model name, used to pick the tiktoken encoding */
  model?: string;

  /** Overrides the tiktoken counter */
  tokenizer?: Tokenizer;
}

export interface ContextWindowManager {
  readonly budget: number;

  countTokens(text: string): number;

  /** Tokens for one turn, overhead included */
  countTurnTokens(turn: Readonly<ConversationTurn>): number;

  countConversationTokens(turns: ConversationHistory): number;

  /**
   * Return a copy of `turns` whose counted total fits `budget`
   * (default: the manager's budget)
   */
  fitToBudget(turns: ConversationHistory, budget?: number): ConversationTurn[];

  /**
   * Replace every system turn with `systemPrompt` (when given), then fit
   */
  prepareForRequest(
    turns: ConversationHistory,
    systemPrompt?: string
  ): ConversationTurn[];
}

/**
 * gpt-4o and the o-series use o200k_base; older OpenAI models and
 * unknown names fall back to cl100k_base
 */
export function encodingForModel(model: string): TiktokenEncoding {
  const name = model.toLowerCase().split('/').pop() ?? '';

  if (
    name.startsWith('gpt-4o') ||
    name.startsWith('gpt-4.1') ||
    /^o\d/.test(name)
  ) {
    return 'o200k_base';
  }
  return 'cl100k_base';
}

export function createTiktokenTokenizer(model = 'gpt-4o'): Tokenizer {
  const encoding = getEncoding(encodingForModel(model));

  return {
    count(text: string): number {
      if (!text) {
        return 0;
      }
      // Special-token strings in user text are counted as ordinary text
      return encoding.encode(text, [], []).length;
    },
  };
}

function copyTurn(turn: Readonly<ConversationTurn>): ConversationTurn {
  return { ...turn };
}

export function truncationMarker(
  retained: number,
  total: number
): ConversationTurn {
  return {
    role: 'assistant',
    content: `[Earlier conversation truncated: kept ${retained} of ${total} turns to fit the context window]`,
  };
}

/**
 * Create a context window manager instance
 */
export function createContextWindowManager(
  config: ContextWindowManagerConfig = {}
): ContextWindowManager {
  const budget = config.budget ?? DEFAULT_CONTEXT_BUDGET;
  const tokenizer = config.tokenizer ?? createTiktokenTokenizer(config.model);

  function countTokens(text: string): number {
    return tokenizer.count(text);
  }

  function countTurnTokens(turn: Readonly<ConversationTurn>): number {
    return (
      countTokens(turn.role) + countTokens(turn.content) + MESSAGE_OVERHEAD_TOKENS
    );
  }

  function countConversationTokens(turns: ConversationHistory): number {
    let total = 0;
    for (const turn of turns) {
      total += countTurnTokens(turn);
    }
    return total;
  }

  function assemble(
    turns: ConversationHistory,
    kept: Set<number>,
    marker: ConversationTurn
  ): ConversationTurn[] {
    const result: ConversationTurn[] = [];
    let markerPlaced = false;

    turns.forEach((turn, index) => {
      if (turn.role === 'system') {
        result.push(copyTurn(turn));
        return;
      }
      if (!kept.has(index)) {
        return;
      }
      if (!markerPlaced) {
        result.push(marker);
        markerPlaced = true;
      }
      result.push(copyTurn(turn));
    });

    if (!markerPlaced) {
      result.push(marker);
    }
    return result;
  }

  function fitToBudget(
    turns: ConversationHistory,
    limit: number = budget
  ): ConversationTurn[] {
    if (countConversationTokens(turns) <= limit) {
      return turns.map(copyTurn);
    }

    const total = turns.length;
    const systemTokens = countConversationTokens(
      turns.filter((turn) => turn.role === 'system')
    );
    const systemCount = turns.filter((turn) => turn.role === 'system').length;
    const candidates = turns
      .map((turn, index) => ({ turn, index }))
      .filter(({ turn }) => turn.role !== 'system');

    // Reserve room for the widest marker this call could produce
    let available =
      limit - systemTokens - countTurnTokens(truncationMarker(total, total));

    // Newest first; the first turn that does not fit ends the walk
    const keptOrder: number[] = [];
    for (const { turn, index } of [...candidates].reverse()) {
      const cost = countTurnTokens(turn);
      if (cost > available) {
        break;
      }
      keptOrder.unshift(index);
      available -= cost;
    }

    let result = assemble(
      turns,
      new Set(keptOrder),
      truncationMarker(systemCount + keptOrder.length, total)
    );

    while (countConversationTokens(result) > limit && keptOrder.length > 0) {
      keptOrder.shift();
      result = assemble(
        turns,
        new Set(keptOrder),
        truncationMarker(systemCount + keptOrder.length, total)
      );
    }

    const dropped = candidates.length - keptOrder.length;
    if (dropped === 0) {
      // Only system turns are over budget and those are never dropped
      log.warn('System turns alone exceed the context budget', {
        systemTokens,
        budget: limit,
      });
      return turns.map(copyTurn);
    }

    log.info('Conversation truncated', {
      total,
      retained: systemCount + keptOrder.length,
      dropped,
      budget: limit,
    });

    if (countConversationTokens(result) > limit) {
      log.warn('System turns alone exceed the context budget', {
        systemTokens,
        budget: limit,
      });
    }

    return result;
  }

  function prepareForRequest(
    turns: ConversationHistory,
    systemPrompt?: string
  ): ConversationTurn[] {
    if (systemPrompt === undefined || systemPrompt === '') {
      return fitToBudget(turns);
    }

    const withPrompt: ConversationTurn[] = [
      { role: 'system', content: systemPrompt },
      ...turns.filter((turn) => turn.role !== 'system').map(copyTurn),
    ];
    return fitToBudget(withPrompt);
  }

  return {
    budget,
    countTokens,
    countTurnTokens,
    countConversationTokens,
    fitToBudget,
    prepareForRequest,
  };
}
