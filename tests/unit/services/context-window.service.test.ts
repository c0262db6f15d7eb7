/**
 * Context Window Manager Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  createContextWindowManager,
  createTiktokenTokenizer,
  encodingForModel,
  truncationMarker,
} from '@/services/context-window.service.js';
import type { ConversationTurn } from '@/types/index.js';

import { wordTokenizer } from '../../helpers/test-utils.js';

// With the word tokenizer a turn costs 1 (role) + words + 4
const SYSTEM: ConversationTurn = { role: 'system', content: 'You are helpful' }; // 8
const TURNS: ConversationTurn[] = [
  SYSTEM,
  { role: 'user', content: 'q1 one two three four' }, // 10
  { role: 'assistant', content: 'r1 one two three four' }, // 10
  { role: 'user', content: 'q2 one two three four' }, // 10
  { role: 'assistant', content: 'r2 one two three four' }, // 10
];

function manager(budget = 1000) {
  return createContextWindowManager({ budget, tokenizer: wordTokenizer });
}

describe('ContextWindowManager', () => {
  describe('counting', () => {
    it('should count role, content and per-message overhead', () => {
      const cwm = manager();
      expect(cwm.countTurnTokens({ role: 'user', content: 'one two three' })).toBe(8);
      expect(cwm.countConversationTokens(TURNS)).toBe(48);
    });

    it('should cost 18 tokens for the truncation marker', () => {
      expect(manager().countTurnTokens(truncationMarker(2, 5))).toBe(18);
    });

    it('should count with tiktoken by default', () => {
      const tokenizer = createTiktokenTokenizer('gpt-4o');
      expect(tokenizer.count('hello world')).toBe(2);
      expect(tokenizer.count('')).toBe(0);
    });
  });

  describe('encodingForModel', () => {
    it('should pick o200k_base for gpt-4o and o-series models', () => {
      expect(encodingForModel('gpt-4o')).toBe('o200k_base');
      expect(encodingForModel('gpt-4o-mini')).toBe('o200k_base');
      expect(encodingForModel('openai/gpt-4o')).toBe('o200k_base');
      expect(encodingForModel('o3-mini')).toBe('o200k_base');
    });

    it('should fall back to cl100k_base', () => {
      expect(encodingForModel('gpt-4')).toBe('cl100k_base');
      expect(encodingForModel('gpt-3.5-turbo')).toBe('cl100k_base');
      expect(encodingForModel('some-local-model')).toBe('cl100k_base');
    });
  });

  describe('fitToBudget()', () => {
    it('should return an equal copy when the conversation fits', () => {
      const result = manager(48).fitToBudget(TURNS);

      expect(result).toEqual(TURNS);
      expect(result).not.toBe(TURNS);
      expect(result[1]).not.toBe(TURNS[1]);
    });

    it('should keep the system turn and the newest turns that fit', () => {
      const cwm = manager(40);
      const result = cwm.fitToBudget(TURNS);

      expect(result).toEqual([
        SYSTEM,
        truncationMarker(2, 5),
        { role: 'assistant', content: 'r2 one two three four' },
      ]);
      expect(cwm.countConversationTokens(result)).toBe(36);
    });

    it('should keep as many recent turns as the budget allows', () => {
      const cwm = manager(46);
      const result = cwm.fitToBudget(TURNS);

      expect(result.map((turn) => turn.content)).toEqual([
        'You are helpful',
        truncationMarker(3, 5).content,
        'q2 one two three four',
        'r2 one two three four',
      ]);
      expect(cwm.countConversationTokens(result)).toBe(46);
    });

    it('should accept a per-call budget', () => {
      const result = manager(1000).fitToBudget(TURNS, 40);
      expect(result).toHaveLength(3);
    });

    it('should stop at an oversized turn instead of skipping it', () => {
      const long = Array.from({ length: 50 }, (_, i) => `w${i}`).join(' ');
      const turns: ConversationTurn[] = [
        { role: 'user', content: 'q1 one two three four' },
        { role: 'assistant', content: long },
        { role: 'user', content: 'q2 one two three four' },
      ];

      const result = manager(40).fitToBudget(turns);

      expect(result).toEqual([
        truncationMarker(1, 3),
        { role: 'user', content: 'q2 one two three four' },
      ]);
    });

    it('should leave only the marker when the newest turn does not fit', () => {
      const long = Array.from({ length: 50 }, (_, i) => `w${i}`).join(' ');
      const turns: ConversationTurn[] = [
        { role: 'user', content: 'q1 one two three four' },
        { role: 'user', content: long },
      ];

      expect(manager(40).fitToBudget(turns)).toEqual([truncationMarker(0, 2)]);
    });

    it('should keep system turns even when they exceed the budget', () => {
      const system: ConversationTurn = {
        role: 'system',
        content: Array.from({ length: 20 }, (_, i) => `s${i}`).join(' '),
      };
      const turns: ConversationTurn[] = [
        system,
        { role: 'user', content: 'q1 one two three four' },
      ];

      const result = manager(20).fitToBudget(turns);

      expect(result).toEqual([system, truncationMarker(1, 2)]);
    });

    it('should add no marker when only system turns are over budget', () => {
      const system: ConversationTurn = {
        role: 'system',
        content: Array.from({ length: 20 }, (_, i) => `s${i}`).join(' '),
      };

      const result = manager(20).fitToBudget([system]);

      expect(result).toEqual([system]);
    });

    it('should not modify its input', () => {
      const frozen = Object.freeze(TURNS.map((turn) => Object.freeze({ ...turn })));
      const before = JSON.stringify(frozen);

      manager(40).fitToBudget(frozen);

      expect(JSON.stringify(frozen)).toBe(before);
    });

    it('should be stable when applied twice', () => {
      const cwm = manager(40);
      const once = cwm.fitToBudget(TURNS);

      expect(cwm.fitToBudget(once)).toEqual(once);
    });
  });

  describe('prepareForRequest()', () => {
    it('should replace system turns with the given prompt', () => {
      const result = manager().prepareForRequest(
        [
          { role: 'system', content: 'old prompt' },
          { role: 'user', content: 'hi' },
        ],
        'new prompt'
      );

      expect(result).toEqual([
        { role: 'system', content: 'new prompt' },
        { role: 'user', content: 'hi' },
      ]);
    });

    it('should fit the result to the budget', () => {
      const result = manager(40).prepareForRequest(TURNS.slice(1), 'You are helpful');

      expect(result[0]).toEqual(SYSTEM);
      expect(result[1]).toEqual(truncationMarker(2, 5));
      expect(result).toHaveLength(3);
    });

    it('should keep the turns as they are without a prompt', () => {
      expect(manager().prepareForRequest(TURNS)).toEqual(TURNS);
    });
  });
});
