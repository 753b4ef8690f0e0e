import { SetupOutcome } from '../../src/domain/models';
import {
    DOWNLOAD_RESULT_ERROR,
    DOWNLOAD_RESULT_OK,
    DOWNLOAD_RESULT_RESOLVABLE_ERROR,
    classifyDownloadResult,
    normalizeSetupOutcome,
    toOpenedFlag,
} from '../../src/domain/outcome';
import { probe } from '../../src/domain/probe';

describe('Result normalization', () => {
    test('download result codes', () => {
        expect(classifyDownloadResult(DOWNLOAD_RESULT_OK)).toBe('ok');
        expect(classifyDownloadResult(DOWNLOAD_RESULT_RESOLVABLE_ERROR)).toBe('resolvable');
        expect(classifyDownloadResult(DOWNLOAD_RESULT_ERROR)).toBe('error');
        expect(classifyDownloadResult(-1)).toBe('error');
        expect(classifyDownloadResult(42)).toBe('error');
    });

    test('values outside the vocabulary normalize to unknown', () => {
        expect(normalizeSetupOutcome('settings_opened')).toBe(SetupOutcome.SETTINGS_OPENED);
        expect(normalizeSetupOutcome('unsupported')).toBe(SetupOutcome.UNSUPPORTED);
        expect(normalizeSetupOutcome('opened')).toBe(SetupOutcome.UNKNOWN);
        expect(normalizeSetupOutcome(true)).toBe(SetupOutcome.UNKNOWN);
        expect(normalizeSetupOutcome(undefined)).toBe(SetupOutcome.UNKNOWN);
    });

    test('boolean projection', () => {
        expect(toOpenedFlag(SetupOutcome.SUCCESS)).toBe(true);
        expect(toOpenedFlag(SetupOutcome.SETTINGS_OPENED)).toBe(true);
        expect(toOpenedFlag(SetupOutcome.FAIL)).toBe(false);
        expect(toOpenedFlag(SetupOutcome.UNSUPPORTED)).toBe(false);
        expect(toOpenedFlag(SetupOutcome.UNKNOWN)).toBe(false);
    });
});

describe('probe', () => {
    test('captures a value, an empty answer and a failure', async () => {
        expect(await probe(async () => 'x')).toEqual({ status: 'success', data: 'x' });
        expect(await probe(async () => null)).toEqual({ status: 'empty' });
        expect(await probe(async () => undefined)).toEqual({ status: 'empty' });

        const failed = await probe(async () => { throw new Error('nope'); });
        expect(failed.status).toBe('degraded');
        if (failed.status === 'degraded') {
            expect(failed.error.message).toBe('nope');
        }
    });

    test('false and 0 are values, not empty answers', async () => {
        expect(await probe(async () => false)).toEqual({ status: 'success', data: false });
        expect(await probe(async () => 0)).toEqual({ status: 'success', data: 0 });
    });

    test('wraps non-Error throws', async () => {
        const failed = await probe(async () => { throw 'plain string'; });
        expect(failed).toEqual({ status: 'degraded', error: new Error('plain string') });
    });
});
