import { SetupOutcome } from './models';

/**
 * Result codes delivered with a download callback (EuiccManager.EMBEDDED_SUBSCRIPTION_RESULT_*).
 */
export const DOWNLOAD_RESULT_OK = 0;
export const DOWNLOAD_RESULT_RESOLVABLE_ERROR = 1;
export const DOWNLOAD_RESULT_ERROR = 2;

export type DownloadResultKind = 'ok' | 'resolvable' | 'error';

export function classifyDownloadResult(resultCode: number): DownloadResultKind {
    switch (resultCode) {
        case DOWNLOAD_RESULT_OK: return 'ok';
        case DOWNLOAD_RESULT_RESOLVABLE_ERROR: return 'resolvable';
        default: return 'error';
    }
}

const OUTCOMES: ReadonlySet<string> = new Set(Object.values(SetupOutcome));

function isSetupOutcome(raw: string): raw is SetupOutcome {
    return OUTCOMES.has(raw);
}

/**
 * Maps any value into the closed vocabulary. Undocumented values become UNKNOWN.
 */
export function normalizeSetupOutcome(raw: unknown): SetupOutcome {
    if (typeof raw === 'string' && isSetupOutcome(raw)) {
        return raw;
    }
    return SetupOutcome.UNKNOWN;
}

/**
 * Boolean projection used by openCellularSettings: was a screen opened or a profile installed.
 */
export function toOpenedFlag(outcome: SetupOutcome): boolean {
    return outcome === SetupOutcome.SUCCESS || outcome === SetupOutcome.SETTINGS_OPENED;
}
