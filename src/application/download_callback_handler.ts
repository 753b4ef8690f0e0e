import { CallbackRegistry, DispatchResult } from '../domain/callback_registry';
import { DownloadCallbackEvent, ResolutionIntent } from '../domain/gateways';

export type CallbackParseResult =
    | { status: 'success'; event: DownloadCallbackEvent }
    | { status: 'failure'; error: Error };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseExtras(value: unknown): Record<string, string> | null {
    if (!isRecord(value)) return null;
    const extras: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
        if (typeof entry !== 'string') return null;
        extras[key] = entry;
    }
    return extras;
}

/**
 * Validates the JSON body the device agent posts: { resultCode, resolution?: { id, extras? } }.
 */
export function parseDownloadCallback(body: unknown): CallbackParseResult {
    if (!isRecord(body)) {
        return { status: 'failure', error: new Error('Callback body must be a JSON object') };
    }

    const { resultCode, resolution } = body;
    if (typeof resultCode !== 'number' || !Number.isInteger(resultCode)) {
        return { status: 'failure', error: new Error('resultCode must be an integer') };
    }
    if (resolution === undefined || resolution === null) {
        return { status: 'success', event: { resultCode } };
    }

    if (!isRecord(resolution) || typeof resolution.id !== 'string' || !resolution.id) {
        return { status: 'failure', error: new Error('resolution.id must be a non-empty string') };
    }

    const intent: ResolutionIntent = { id: resolution.id };
    if (resolution.extras !== undefined) {
        const extras = parseExtras(resolution.extras);
        if (!extras) {
            return { status: 'failure', error: new Error('resolution.extras must map strings to strings') };
        }
        intent.extras = extras;
    }

    return { status: 'success', event: { resultCode, resolution: intent } };
}

export class DownloadCallbackHandler {
    constructor(private readonly registry: CallbackRegistry<DownloadCallbackEvent>) { }

    /**
     * Delivers one OS download result to the setup call waiting on `token`.
     * Late or duplicate deliveries are reported, never re-delivered.
     */
    handle(token: string, event: DownloadCallbackEvent): DispatchResult {
        const result = this.registry.dispatch(token, event);

        switch (result) {
            case 'delivered':
                console.log(`[Callbacks] DELIVERED: ${token} (result code ${event.resultCode})`);
                break;
            case 'already_consumed':
                console.warn(`[Callbacks] DUPLICATE: ${token} already fired or timed out`);
                break;
            case 'unknown_token':
                console.warn(`[Callbacks] UNKNOWN TOKEN: ${token}`);
                break;
        }
        return result;
    }
}
