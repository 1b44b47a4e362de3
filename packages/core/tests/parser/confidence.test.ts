import { describe, it, expect } from 'vitest';
import { applyTypeDiscount, scoreConfidence } from '../../src/parser/confidence.js';
import type { ConfidenceInput } from '../../src/parser/types.js';

function input(overrides: Partial<ConfidenceInput>): ConfidenceInput {
    return {
        hasAmount: false,
        amountConfidence: 0,
        hasCategory: false,
        categoryConfidence: 0,
        matchedKeywordCount: 0,
        text: '',
        ...overrides,
    };
}

describe('scoreConfidence', () => {
    it('returns 0.1 when nothing was found', () => {
        expect(scoreConfidence(input({}))).toBe(0.1);
    });

    it('scales a category-only result', () => {
        expect(scoreConfidence(input({ hasCategory: true, categoryConfidence: 0.85, matchedKeywordCount: 1 })))
            .toBe(0.51);
    });

    it('scales an amount-only result', () => {
        expect(scoreConfidence(input({ hasAmount: true, amountConfidence: 0.95 }))).toBe(0.57);
    });

    it('floors partial results at 0.3', () => {
        expect(scoreConfidence(input({ hasCategory: true, categoryConfidence: 0.45, matchedKeywordCount: 1 })))
            .toBe(0.3);
    });

    it('boosts short messages with a keyword', () => {
        expect(scoreConfidence(input({
            hasAmount: true,
            amountConfidence: 0.95,
            hasCategory: true,
            categoryConfidence: 0.85,
            matchedKeywordCount: 1,
            text: '50k taxi',
        }))).toBe(0.945);
    });

    it('caps the multi-keyword boost at 0.98', () => {
        expect(scoreConfidence(input({
            hasAmount: true,
            amountConfidence: 0.95,
            hasCategory: true,
            categoryConfidence: 0.95,
            matchedKeywordCount: 2,
            text: 'had lunch at the cafe today 50k',
        }))).toBe(0.98);
    });

    it('caps the short-text boost at 0.95', () => {
        expect(scoreConfidence(input({
            hasAmount: true,
            amountConfidence: 0.95,
            hasCategory: true,
            categoryConfidence: 0.95,
            matchedKeywordCount: 2,
            text: 'lunch at cafe 50k',
        }))).toBe(0.95);
    });

    it('does not boost long messages with one keyword', () => {
        expect(scoreConfidence(input({
            hasAmount: true,
            amountConfidence: 0.95,
            hasCategory: true,
            categoryConfidence: 0.65,
            matchedKeywordCount: 1,
            text: 'picked up some snack for the road 15k',
        }))).toBe(0.8);
    });
});

describe('applyTypeDiscount', () => {
    it('leaves confident type calls alone', () => {
        expect(applyTypeDiscount(0.9, 0.7)).toBe(0.9);
    });

    it('discounts uncertain type calls by 10%', () => {
        expect(applyTypeDiscount(0.8, 0.65)).toBe(0.72);
    });
});
