/**
 * Mobile operating systems the bridge can drive.
 */
export enum DevicePlatform {
    ANDROID = 'android',
    IOS = 'ios',
}

/**
 * Host platforms the bridge can be configured for.
 * Anything other than android/ios has no eSIM service and gets fixed defaults.
 */
export type HostPlatform = 'android' | 'ios' | 'web' | 'desktop';

/**
 * Closed outcome vocabulary of the setup flow.
 */
export enum SetupOutcome {
    SUCCESS = 'success',
    FAIL = 'fail',
    SETTINGS_OPENED = 'settings_opened',
    UNSUPPORTED = 'unsupported',
    UNKNOWN = 'unknown',
}

/**
 * Information about an active cellular plan on the device.
 * `slot` is stable within one listing only.
 */
export interface SubscriptionRecord {
    slot: string;
    carrierName?: string;
    mobileCountryCode?: string;
    mobileNetworkCode?: string;
    isoCountryCode?: string;
    isEmbedded?: boolean;   // Android, API 28+
    allowsVoip?: boolean;   // iOS only
    subscriptionId?: number; // Android only
}

/**
 * Detailed eSIM capability of the current device.
 */
export interface CapabilityReport {
    isSupported: boolean;
    platform: DevicePlatform;
    reason: string;

    // Android only, and only when retrievable without error
    firmwareVersion?: string;
    portAvailable?: boolean;

    // iOS only, when at least one carrier is reported
    activePlans?: SubscriptionRecord[];
}

/**
 * The running OS as the bridge sees it for one call.
 * `osVersion` is an API level on Android ("33") and a dotted version on iOS ("17.4.1").
 */
export interface DeviceProfile {
    platform: DevicePlatform;
    osVersion: string;
}
