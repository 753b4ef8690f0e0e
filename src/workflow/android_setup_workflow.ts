import { randomUUID } from 'node:crypto';
import { DownloadableSubscription, forActivationCode } from '../domain/activation_code';
import { CallbackRegistry } from '../domain/callback_registry';
import { CapabilityTier, Feature, classifyTier, supportsFeature } from '../domain/capability_tier';
import { describeError } from '../domain/errors';
import {
    ACTION_DOWNLOAD_SUBSCRIPTION,
    ACTION_MANAGE_EMBEDDED_SUBSCRIPTIONS,
    AndroidPlatformGateway,
    CallbackHandle,
    DownloadCallbackEvent,
    EuiccService,
    FLAG_ACTIVITY_NEW_TASK,
} from '../domain/gateways';
import { DevicePlatform, DeviceProfile, SetupOutcome } from '../domain/models';
import { classifyDownloadResult } from '../domain/outcome';
import { probe } from '../domain/probe';

/**
 * 1. DEFINITIONS: Public and Internal Types
 */

export interface SetupRequest {
    activationCode?: string;
}

export interface SetupDependencies {
    device: AndroidPlatformGateway;
    registry: CallbackRegistry<DownloadCallbackEvent>;
    createToken?: () => string;
    /**
     * Give up waiting for the download callback after this long (outcome UNKNOWN).
     * Unset means wait for as long as the OS takes.
     */
    timeoutMs?: number;
}

type StepResult<T> =
    | { status: 'success'; data: T }
    | { status: 'halt'; outcome: SetupOutcome; reason: string }
    | { status: 'failure'; error: Error };

interface Context {
    readonly request: SetupRequest;
    readonly deps: SetupDependencies;
    readonly profile?: DeviceProfile;
    readonly euicc?: EuiccService;
    readonly activationCode?: string;
    readonly subscription?: DownloadableSubscription;
    readonly outcome?: SetupOutcome;
}

const CLIP_LABEL = 'eSIM Activation Code';
const RESOLUTION_REQUEST_CODE = 0;

function ok<T>(data: T): StepResult<T> { return { status: 'success', data }; }
function halt<T>(outcome: SetupOutcome, reason: string): StepResult<T> { return { status: 'halt', outcome, reason }; }
function fail<T>(error: unknown): StepResult<T> {
    return { status: 'failure', error: error instanceof Error ? error : new Error(String(error)) };
}

/**
 * 2. STEPS
 */

// Step 1: Version Gate
async function versionGate(ctx: Context): Promise<StepResult<Context>> {
    const sdk = await probe(() => ctx.deps.device.getSdkInt());
    if (sdk.status !== 'success') {
        return halt(SetupOutcome.UNSUPPORTED, 'Unable to read the Android API level');
    }

    const profile: DeviceProfile = { platform: DevicePlatform.ANDROID, osVersion: String(sdk.data) };
    if (classifyTier(profile) !== CapabilityTier.DIRECT_INSTALL) {
        return halt(SetupOutcome.UNSUPPORTED, `API ${sdk.data} predates eSIM installation support`);
    }
    return ok({ ...ctx, profile });
}

// Step 2: Service Gate
async function serviceGate(ctx: Context): Promise<StepResult<Context>> {
    const service = await probe(() => ctx.deps.device.getEuiccService());
    if (service.status !== 'success') {
        return halt(SetupOutcome.UNSUPPORTED, 'EuiccManager service not available');
    }

    const enabled = await probe(() => service.data.isEnabled());
    if (enabled.status !== 'success' || !enabled.data) {
        return halt(SetupOutcome.UNSUPPORTED, 'EuiccManager reports eSIM disabled');
    }
    return ok({ ...ctx, euicc: service.data });
}

// Step 3: Input Gate
async function inputGate(ctx: Context): Promise<StepResult<Context>> {
    const code = ctx.request.activationCode;
    if (!code) {
        return halt(SetupOutcome.FAIL, 'No activation code supplied');
    }
    return ok({ ...ctx, activationCode: code });
}

// Step 4a: Build the download request. A malformed code is a failure, which routes to the fallback.
async function prepareRequest(ctx: Context): Promise<StepResult<Context>> {
    if (!ctx.activationCode) return fail('Invalid state: no activation code');
    try {
        return ok({ ...ctx, subscription: forActivationCode(ctx.activationCode) });
    } catch (e: unknown) {
        return fail(e);
    }
}

// Step 4b: Submit and wait for the one-shot callback
async function directDownload(ctx: Context): Promise<StepResult<Context>> {
    const { deps, euicc, subscription, profile } = ctx;
    if (!euicc || !subscription || !profile) return fail('Invalid context for download');

    const token = (deps.createToken ?? randomUUID)();
    const callback: CallbackHandle = {
        token,
        action: ACTION_DOWNLOAD_SUBSCRIPTION,
        exported: !supportsFeature(profile, Feature.NOT_EXPORTED_RECEIVER),
    };

    try {
        const outcome = await new Promise<SetupOutcome>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;
            const finish = (value: SetupOutcome) => {
                if (timer) clearTimeout(timer);
                resolve(value);
            };

            // Register immediately before triggering the OS action
            deps.registry.register(token, (event) => {
                void handleDownloadResult(ctx, euicc, callback, event).then(finish, () => finish(SetupOutcome.FAIL));
            });

            if (deps.timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    if (deps.registry.cancel(token)) {
                        console.warn(`[Setup] No download callback within ${deps.timeoutMs}ms (token ${token})`);
                        resolve(SetupOutcome.UNKNOWN);
                    }
                }, deps.timeoutMs);
            }

            void euicc.downloadSubscription(subscription, true, callback).catch((e: unknown) => {
                // Only a submission that failed before any callback fired goes to the fallback
                if (deps.registry.cancel(token)) {
                    if (timer) clearTimeout(timer);
                    reject(e);
                }
            });
        });

        return ok({ ...ctx, outcome });
    } catch (e: unknown) {
        return fail(e);
    }
}

async function handleDownloadResult(
    ctx: Context,
    euicc: EuiccService,
    callback: CallbackHandle,
    event: DownloadCallbackEvent
): Promise<SetupOutcome> {
    switch (classifyDownloadResult(event.resultCode)) {
        case 'ok':
            return SetupOutcome.SUCCESS;

        case 'resolvable': {
            // The app lacks carrier privileges: the OS wants user consent
            const foreground = await probe(() => ctx.deps.device.currentForegroundContext());
            if (foreground.status !== 'success' || !event.resolution) {
                console.warn('[Setup] Consent required but no foreground activity is available');
                return SetupOutcome.FAIL;
            }

            const resolution = event.resolution;
            const started = await probe(async () => {
                await euicc.startResolutionActivity(foreground.data, RESOLUTION_REQUEST_CODE, resolution, callback);
                return true;
            });
            if (started.status === 'degraded') {
                console.warn(`[Setup] Resolution activity failed to start: ${started.error.message}`);
                return SetupOutcome.FAIL;
            }
            return SetupOutcome.SETTINGS_OPENED;
        }

        default:
            console.warn(`[Setup] Download rejected by the OS (result code ${event.resultCode})`);
            return SetupOutcome.FAIL;
    }
}

/**
 * Copies the code (when given) and opens the system eSIM management screen,
 * through the foreground activity when there is one.
 */
export async function openManagementScreen(
    device: AndroidPlatformGateway,
    activationCode?: string
): Promise<SetupOutcome> {
    if (activationCode) {
        const clipboard = await probe(() => device.getClipboardService());
        const copied = clipboard.status === 'success'
            ? await probe(async () => {
                await clipboard.data.setPrimaryClip(CLIP_LABEL, activationCode);
                return true;
            })
            : clipboard;
        if (copied.status !== 'success') {
            console.warn('[Setup] Activation code could not be copied to the clipboard');
        }
    }

    const foreground = await probe(() => device.currentForegroundContext());
    const context = foreground.status === 'success' ? foreground.data : device.applicationContext();

    const launched = await probe(async () => {
        await device.startActivity(context, {
            action: ACTION_MANAGE_EMBEDDED_SUBSCRIPTIONS,
            flags: [FLAG_ACTIVITY_NEW_TASK],
        });
        return true;
    });
    if (launched.status === 'degraded') {
        console.warn(`[Setup] eSIM management screen failed to open: ${launched.error.message}`);
        return SetupOutcome.FAIL;
    }
    return SetupOutcome.SETTINGS_OPENED;
}

/**
 * 3. ORCHESTRATOR (Public Function)
 * Never rejects: every branch ends in a SetupOutcome.
 */
export async function runAndroidSetupWorkflow(
    request: SetupRequest,
    deps: SetupDependencies
): Promise<SetupOutcome> {
    let result: StepResult<Context> = ok({ request, deps });

    const pipeline = [
        versionGate,
        serviceGate,
        inputGate,
        prepareRequest,
        directDownload,
    ];

    for (const step of pipeline) {
        if (result.status !== 'success') break;
        result = await step(result.data);
    }

    if (result.status === 'halt') {
        console.log(`[Setup] ${result.outcome}: ${result.reason}`);
        return result.outcome;
    }

    if (result.status === 'failure') {
        console.warn(`[Setup] Direct download unavailable (${describeError(result.error)}), falling back to settings`);
        return openManagementScreen(deps.device, request.activationCode);
    }

    return result.data.outcome ?? SetupOutcome.UNKNOWN;
}
