import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let tmpDir: string;

    const writeConfig = (content: unknown): void => {
        fs.writeFileSync(path.join(tmpDir, 'predigraph.config.json'), JSON.stringify(content), 'utf-8');
    };

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'predigraph-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should fall back to defaults without a config file', async () => {
        expect(await resolveConfig({}, tmpDir)).toEqual(DEFAULT_CONFIG);
    });

    it('should read the config file and complete the precedence', async () => {
        writeConfig({ hubTopK: 5, sourcePrecedence: ['metadata'] });

        const config = await resolveConfig({}, tmpDir);
        expect(config.hubTopK).toBe(5);
        expect(config.sourcePrecedence).toEqual(['metadata', 'direct_mapping', 'extraction', 'supplement']);
        expect(config.maxChainDepth).toBe(6);
    });

    it('should let CLI flags win over the file', async () => {
        writeConfig({ hubTopK: 5, out: 'from-file.db' });

        const config = await resolveConfig({ hubTopK: 7, out: undefined }, tmpDir);
        expect(config.hubTopK).toBe(7);
        expect(config.out).toBe('from-file.db');
    });

    it('should reject out-of-range values', async () => {
        writeConfig({ hubTopK: 0 });
        await expect(resolveConfig({}, tmpDir)).rejects.toThrow('Invalid config file');
    });

    it('should reject unknown keys', async () => {
        writeConfig({ hubTopk: 5 });
        await expect(resolveConfig({}, tmpDir)).rejects.toThrow('Invalid config file');
    });

    it('should reject repeated sources', async () => {
        writeConfig({ sourcePrecedence: ['metadata', 'metadata'] });
        await expect(resolveConfig({}, tmpDir)).rejects.toThrow('sources must not repeat');
    });
});
