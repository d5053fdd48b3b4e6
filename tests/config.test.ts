/**
 * Tests for environment configuration
 */

import { loadConfig } from '../src/config.js';
import { TransformException } from '../src/types/errors.js';
import { captureError } from './fixtures.js';

describe('loadConfig', () => {
    test('uses defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            inputDir: 'data/raw',
            outputDir: 'data/transformed',
            compression: 'none',
            addExcludedPhenotypes: false,
            sortOutput: false,
            fullEdgeSchema: false,
        });
    });

    test('reads every variable', () => {
        expect(loadConfig({
            HPOA_INPUT_DIR: '/in',
            HPOA_OUTPUT_DIR: '/out',
            HPOA_COMPRESSION: 'gz',
            HPOA_ADD_EXCLUDED: 'true',
            HPOA_SORT_OUTPUT: '1',
            HPOA_FULL_EDGES: 'false',
        })).toEqual({
            inputDir: '/in',
            outputDir: '/out',
            compression: 'gz',
            addExcludedPhenotypes: true,
            sortOutput: true,
            fullEdgeSchema: false,
        });
    });

    test('ignores unrelated variables', () => {
        expect(loadConfig({ PATH: '/usr/bin', HOME: '/root' }).inputDir).toBe('data/raw');
    });

    test('leaves the compression tag to be checked after flags are merged', () => {
        expect(loadConfig({ HPOA_COMPRESSION: 'zip' }).compression).toBe('zip');
    });

    test('rejects an empty directory', () => {
        const error = captureError(() => loadConfig({ HPOA_INPUT_DIR: '' }));
        expect(error).toBeInstanceOf(TransformException);
        expect(error).toMatchObject({ error: { code: 'INVALID_CONFIG' } });
    });

    test('rejects a malformed boolean', () => {
        expect(() => loadConfig({ HPOA_SORT_OUTPUT: 'yes' })).toThrow(/HPOA_SORT_OUTPUT/);
    });
});
