import { DownloadableSubscription } from '../domain/activation_code';
import { DispatchResult } from '../domain/callback_registry';
import { PermissionDeniedError } from '../domain/errors';
import {
    ActivityIntent,
    AndroidPlatformGateway,
    CallbackHandle,
    CallbackSink,
    ClipboardService,
    DownloadCallbackEvent,
    EuiccInfo,
    EuiccService,
    LaunchContext,
    ResolutionIntent,
    SubscriptionInfo,
    SubscriptionService,
} from '../domain/gateways';
import { DOWNLOAD_RESULT_OK } from '../domain/outcome';

/**
 * A failure to inject into one simulated OS call.
 */
export type SimulatedFault = 'permission_denied' | Error;

export interface SimulatedAndroidState {
    sdkInt: number;
    hasEuiccService: boolean;
    euiccEnabled: boolean;
    euiccOsVersion: string | null;
    simPortAvailable: boolean;
    hasSubscriptionService: boolean;
    subscriptions: SubscriptionInfo[] | null;
    hasClipboardService: boolean;
    foregroundActivity: string | null;

    /**
     * What the OS answers to a download. 'none' never calls back.
     */
    downloadResult: DownloadCallbackEvent | 'none';
}

export type AndroidCall =
    | 'getSdkInt'
    | 'getEuiccInfo'
    | 'isSimPortAvailable'
    | 'getActiveSubscriptionInfoList'
    | 'downloadSubscription'
    | 'startResolutionActivity'
    | 'setPrimaryClip'
    | 'startActivity';

export interface DownloadRequestRecord {
    subscription: DownloadableSubscription;
    switchAfterDownload: boolean;
    callback: CallbackHandle;
}

export interface LaunchRecord {
    context: LaunchContext;
    intent?: ActivityIntent;
    resolution?: ResolutionIntent;
}

const DEFAULT_STATE: SimulatedAndroidState = {
    sdkInt: 34,
    hasEuiccService: true,
    euiccEnabled: true,
    euiccOsVersion: '2.3.0',
    simPortAvailable: true,
    hasSubscriptionService: true,
    subscriptions: [],
    hasClipboardService: true,
    foregroundActivity: 'MainActivity',
    downloadResult: { resultCode: DOWNLOAD_RESULT_OK },
};

const APPLICATION_CONTEXT: LaunchContext = { kind: 'application', id: 'application' };

/**
 * In-memory Android device. Download results are delivered to the sink
 * (normally the bridge's CallbackRegistry) the way the OS fires a PendingIntent.
 */
export class SimulatedAndroidDevice implements AndroidPlatformGateway {
    readonly state: SimulatedAndroidState;
    readonly downloads: DownloadRequestRecord[] = [];
    readonly launches: LaunchRecord[] = [];
    readonly clipboard: { label: string; text: string }[] = [];

    private faults: Map<AndroidCall, SimulatedFault> = new Map();
    private sink?: CallbackSink<DownloadCallbackEvent>;

    constructor(state: Partial<SimulatedAndroidState> = {}) {
        this.state = { ...DEFAULT_STATE, ...state };
    }

    connect(sink: CallbackSink<DownloadCallbackEvent>): this {
        this.sink = sink;
        return this;
    }

    failOn(call: AndroidCall, fault: SimulatedFault): this {
        this.faults.set(call, fault);
        return this;
    }

    clearFaults(): this {
        this.faults.clear();
        return this;
    }

    async getSdkInt(): Promise<number> {
        this.raiseFault('getSdkInt');
        return this.state.sdkInt;
    }

    async getEuiccService(): Promise<EuiccService | null> {
        return this.state.hasEuiccService ? this.euiccService() : null;
    }

    async getSubscriptionService(): Promise<SubscriptionService | null> {
        if (!this.state.hasSubscriptionService) return null;
        return {
            getActiveSubscriptionInfoList: async () => {
                this.raiseFault('getActiveSubscriptionInfoList');
                return this.state.subscriptions ? this.state.subscriptions.map(s => ({ ...s })) : null;
            },
        };
    }

    async getClipboardService(): Promise<ClipboardService | null> {
        if (!this.state.hasClipboardService) return null;
        return {
            setPrimaryClip: async (label, text) => {
                this.raiseFault('setPrimaryClip');
                this.clipboard.push({ label, text });
            },
        };
    }

    async currentForegroundContext(): Promise<LaunchContext | null> {
        const activity = this.state.foregroundActivity;
        return activity ? { kind: 'activity', id: activity } : null;
    }

    applicationContext(): LaunchContext {
        return APPLICATION_CONTEXT;
    }

    async startActivity(context: LaunchContext, intent: ActivityIntent): Promise<void> {
        this.raiseFault('startActivity');
        this.launches.push({ context, intent });
    }

    /**
     * Fires a download result for a pending request, as the OS would later.
     */
    deliver(token: string, event: DownloadCallbackEvent): DispatchResult {
        if (!this.sink) {
            throw new Error('Simulated device has no callback sink connected');
        }
        return this.sink.dispatch(token, event);
    }

    private euiccService(): EuiccService {
        return {
            isEnabled: async () => this.state.euiccEnabled,

            getEuiccInfo: async (): Promise<EuiccInfo | null> => {
                this.raiseFault('getEuiccInfo');
                return { osVersion: this.state.euiccOsVersion };
            },

            isSimPortAvailable: async () => {
                this.raiseFault('isSimPortAvailable');
                return this.state.simPortAvailable;
            },

            downloadSubscription: async (subscription, switchAfterDownload, callback) => {
                this.raiseFault('downloadSubscription');
                const sink = this.sink;
                if (!sink) {
                    throw new Error('Simulated device has no callback sink connected');
                }
                this.downloads.push({ subscription, switchAfterDownload, callback });

                const result = this.state.downloadResult;
                if (result !== 'none') {
                    // The OS answers asynchronously, after the submission returns
                    setImmediate(() => sink.dispatch(callback.token, result));
                }
            },

            startResolutionActivity: async (context, _requestCode, resolution) => {
                this.raiseFault('startResolutionActivity');
                this.launches.push({ context, resolution });
            },
        };
    }

    private raiseFault(call: AndroidCall): void {
        const fault = this.faults.get(call);
        if (!fault) return;
        throw fault === 'permission_denied'
            ? new PermissionDeniedError(`${call}: READ_PHONE_STATE not granted`)
            : fault;
    }
}
