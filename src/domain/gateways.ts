import { DownloadableSubscription } from './activation_code';
import { DispatchResult } from './callback_registry';

/**
 * OS collaborators the bridge drives. Implementations live in infrastructure
 * (simulated devices) and api (device agent client).
 * Any method may reject; the bridge absorbs every rejection.
 */

// ===========================================
// Android
// ===========================================

export const ACTION_MANAGE_EMBEDDED_SUBSCRIPTIONS = 'android.telephony.euicc.action.MANAGE_EMBEDDED_SUBSCRIPTIONS';
export const ACTION_DOWNLOAD_SUBSCRIPTION = 'esim.bridge.DOWNLOAD_SUBSCRIPTION';
export const FLAG_ACTIVITY_NEW_TASK = 'FLAG_ACTIVITY_NEW_TASK';

export interface EuiccInfo {
    osVersion: string | null;
}

/**
 * Opaque handle the OS hands back when a download needs user consent.
 */
export interface ResolutionIntent {
    id: string;
    extras?: Record<string, string>;
}

export interface DownloadCallbackEvent {
    resultCode: number;
    resolution?: ResolutionIntent;
}

/**
 * Where the OS delivers the one-shot download result (PendingIntent equivalent).
 */
export interface CallbackHandle {
    token: string;
    action: string;
    exported: boolean;
}

export interface CallbackSink<E> {
    dispatch(token: string, event: E): DispatchResult;
}

export interface LaunchContext {
    kind: 'activity' | 'application';
    id: string;
}

export interface ActivityIntent {
    action: string;
    flags: string[];
}

export interface EuiccService {
    isEnabled(): Promise<boolean>;
    getEuiccInfo(): Promise<EuiccInfo | null>;
    isSimPortAvailable(portIndex: number): Promise<boolean>;
    downloadSubscription(
        subscription: DownloadableSubscription,
        switchAfterDownload: boolean,
        callback: CallbackHandle
    ): Promise<void>;
    startResolutionActivity(
        context: LaunchContext,
        requestCode: number,
        resolution: ResolutionIntent,
        callback: CallbackHandle
    ): Promise<void>;
}

export interface SubscriptionInfo {
    simSlotIndex: number;
    subscriptionId: number;
    carrierName: string | null;
    mccString: string | null;
    mncString: string | null;
    countryIso: string | null;
    isEmbedded: boolean;
}

export interface SubscriptionService {
    /**
     * Rejects with PermissionDeniedError when READ_PHONE_STATE is missing.
     */
    getActiveSubscriptionInfoList(): Promise<SubscriptionInfo[] | null>;
}

export interface ClipboardService {
    setPrimaryClip(label: string, text: string): Promise<void>;
}

export interface AndroidPlatformGateway {
    getSdkInt(): Promise<number>;

    /**
     * Null when the device model has no such system service.
     */
    getEuiccService(): Promise<EuiccService | null>;
    getSubscriptionService(): Promise<SubscriptionService | null>;
    getClipboardService(): Promise<ClipboardService | null>;

    currentForegroundContext(): Promise<LaunchContext | null>;
    applicationContext(): LaunchContext;
    startActivity(context: LaunchContext, intent: ActivityIntent): Promise<void>;
}

// ===========================================
// iOS
// ===========================================

export interface CarrierInfo {
    carrierName: string | null;
    mobileCountryCode: string | null;
    mobileNetworkCode: string | null;
    isoCountryCode: string | null;
    allowsVoip: boolean;
}

export interface IosPlatformGateway {
    getSystemVersion(): Promise<string>;
    supportsCellularPlan(): Promise<boolean>;

    /**
     * Keyed by service identifier; null when CoreTelephony reports nothing.
     */
    serviceSubscriberCellularProviders(): Promise<Record<string, CarrierInfo> | null>;

    canOpenUrl(url: string): Promise<boolean>;
    openUrl(url: string): Promise<boolean>;
}
