import { describe, it, expect } from 'vitest';
import {
    ALL_SOURCES,
    DEFAULT_CONFIG,
    ENTITY_FIELD_NAMES,
    edgeKey,
    insufficient,
    measured,
} from '../types/index.js';

describe('Types', () => {
    describe('sources', () => {
        it('should list the four sources in default precedence order', () => {
            expect(ALL_SOURCES).toEqual(['direct_mapping', 'extraction', 'metadata', 'supplement']);
        });

        it('should name 11 entity fields', () => {
            expect(ENTITY_FIELD_NAMES).toHaveLength(11);
            expect(new Set(ENTITY_FIELD_NAMES).size).toBe(11);
        });
    });

    describe('Metric', () => {
        it('should wrap a measured value', () => {
            expect(measured(42)).toEqual({ status: 'ok', value: 42 });
        });

        it('should carry the reason for missing data', () => {
            expect(insufficient('no dates')).toEqual({ status: 'insufficient_data', reason: 'no dates' });
        });
    });

    it('edgeKey should join citing and cited', () => {
        expect(edgeKey('K200001', 'K190001')).toBe('K200001->K190001');
    });

    describe('DEFAULT_CONFIG', () => {
        it('should rank direct mappings above extraction above metadata', () => {
            expect(DEFAULT_CONFIG.sourcePrecedence).toEqual(['direct_mapping', 'extraction', 'metadata', 'supplement']);
        });

        it('should bound chains at depth 6 by default', () => {
            expect(DEFAULT_CONFIG.maxChainDepth).toBe(6);
        });

        it('should list 20 hubs by default', () => {
            expect(DEFAULT_CONFIG.hubTopK).toBe(20);
        });

        it('should write ./predigraph.db by default', () => {
            expect(DEFAULT_CONFIG.out).toBe('./predigraph.db');
        });
    });
});
