/**
 * Unit tests for Query Processor
 *
 * Tests the validateQuery function to ensure it correctly:
 * - Accepts valid queries
 * - Rejects missing, empty and whitespace-only queries
 *
 * Tests prompt assembly:
 * - Context chunks joined in ranked order
 * - The fixed user prompt layout
 */

import {
    validateQuery,
    buildContextBlock,
    buildUserPrompt,
    CONTEXT_SEPARATOR,
} from '../queryProcessor';
import * as fc from 'fast-check';

describe('validateQuery', () => {
    describe('valid queries', () => {
        it('should accept a simple text query', () => {
            const result = validateQuery('How do I deploy Nexa?');
            expect(result.valid).toBe(true);
            expect(result.error).toBeUndefined();
        });

        it('should accept a query with leading/trailing spaces (content exists)', () => {
            const result = validateQuery('  How do I rotate API keys?  ');
            expect(result.valid).toBe(true);
        });

        it('should accept a single character query', () => {
            const result = validateQuery('?');
            expect(result.valid).toBe(true);
        });
    });

    describe('invalid queries - missing', () => {
        it('should reject null and undefined', () => {
            expect(validateQuery(null)).toEqual({ valid: false, error: 'Query is required' });
            expect(validateQuery(undefined)).toEqual({ valid: false, error: 'Query is required' });
        });
    });

    describe('invalid queries - empty', () => {
        it('should reject an empty string', () => {
            const result = validateQuery('');
            expect(result.valid).toBe(false);
            expect(result.error).toBe('Query cannot be empty or contain only whitespace');
        });
    });

    describe('invalid queries - whitespace only', () => {
        it('should reject a string with only spaces', () => {
            expect(validateQuery('   ').valid).toBe(false);
        });

        it('should reject a string with only tabs', () => {
            expect(validateQuery('\t\t').valid).toBe(false);
        });

        it('should reject a string with mixed whitespace', () => {
            const result = validateQuery(' \t \n ');
            expect(result.valid).toBe(false);
            expect(result.error).toBeDefined();
        });
    });
});

describe('Property-Based Tests', () => {
    /**
     * Property: for ANY string composed entirely of whitespace characters
     * (spaces, tabs, newlines, etc.), validation rejects it.
     */
    describe('Whitespace query rejection', () => {
        const whitespaceOnlyString = fc.stringOf(
            fc.constantFrom(' ', '\t', '\n', '\r', '\f', '\v')
        );

        it('should reject any string composed entirely of whitespace', () => {
            fc.assert(
                fc.property(whitespaceOnlyString, (whitespaceQuery) => {
                    const result = validateQuery(whitespaceQuery);
                    expect(result.valid).toBe(false);
                    expect(result.error).toBeDefined();
                }),
                { numRuns: 100 }
            );
        });

        it('should accept any string that contains at least one non-whitespace character', () => {
            const nonEmptyQuery = fc
                .string({ minLength: 1 })
                .filter((s) => s.trim().length > 0);

            fc.assert(
                fc.property(nonEmptyQuery, (validQuery) => {
                    const result = validateQuery(validQuery);
                    expect(result.valid).toBe(true);
                    expect(result.error).toBeUndefined();
                }),
                { numRuns: 100 }
            );
        });
    });
});

describe('buildContextBlock', () => {
    it('should join chunks with the separator in the given order', () => {
        expect(buildContextBlock(['first', 'second', 'third'])).toBe(
            'first\n---\nsecond\n---\nthird'
        );
    });

    it('should return the single chunk unchanged', () => {
        expect(buildContextBlock(['only'])).toBe('only');
    });

    it('should contain every chunk exactly once', () => {
        fc.assert(
            fc.property(
                fc.array(fc.stringOf(fc.constantFrom('a', 'b', ' ')), { minLength: 1, maxLength: 6 }),
                (chunks) => {
                    const block = buildContextBlock(chunks);
                    expect(block.split(CONTEXT_SEPARATOR)).toEqual(chunks);
                }
            )
        );
    });
});

describe('buildUserPrompt', () => {
    it('should lay out instructions, context, question and closing line', () => {
        const prompt = buildUserPrompt('Use only the docs.', 'How do I deploy?', [
            'Run nexa deploy.',
            'Set NEXA_ENV first.',
        ]);

        expect(prompt).toBe(
            'Use only the docs.\n' +
                'Context:\nRun nexa deploy.\n---\nSet NEXA_ENV first.\n\n' +
                'User question: How do I deploy?\n' +
                'Answer concisely using only the context.'
        );
    });

    it('should keep an empty instruction prefix as a blank first line', () => {
        const prompt = buildUserPrompt('', 'q', ['c']);
        expect(prompt.startsWith('\nContext:\nc\n\n')).toBe(true);
    });
});
