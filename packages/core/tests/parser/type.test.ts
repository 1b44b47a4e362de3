import { describe, it, expect } from 'vitest';
import { classifyType } from '../../src/parser/type.js';
import { DEFAULT_LEXICON } from '../../src/types/index.js';

describe('classifyType', () => {
    it('detects income from strong indicators', () => {
        // received + salary = 4 -> capped at 0.95
        expect(classifyType('received 5k salary', DEFAULT_LEXICON)).toEqual({ type: 'income', confidence: 0.95 });
    });

    it('detects income from a weak indicator alone', () => {
        expect(classifyType('got 100', DEFAULT_LEXICON)).toEqual({ type: 'income', confidence: 0.65 });
    });

    it('detects Cyrillic income', () => {
        expect(classifyType('получил зарплату', DEFAULT_LEXICON)).toEqual({ type: 'income', confidence: 0.8 });
    });

    it('detects expenses and caps confidence at 0.9', () => {
        // spent (2) + on (0.5) = 2.5 -> 0.95 capped
        expect(classifyType('spent on taxi', DEFAULT_LEXICON)).toEqual({ type: 'expense', confidence: 0.9 });
    });

    it('resolves a tie as expense', () => {
        // income: got paid + got = 2.5, expense: paid + for = 2.5
        expect(classifyType('got paid for it', DEFAULT_LEXICON)).toEqual({ type: 'expense', confidence: 0.9 });
    });

    it('defaults to expense at 0.6', () => {
        expect(classifyType('50k taxi', DEFAULT_LEXICON)).toEqual({ type: 'expense', confidence: 0.6 });
    });

    it('ignores casing', () => {
        expect(classifyType('RECEIVED SALARY', DEFAULT_LEXICON).type).toBe('income');
    });
});
