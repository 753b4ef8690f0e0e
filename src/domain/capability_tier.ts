import { DevicePlatform, DeviceProfile } from './models';

/**
 * How much eSIM functionality the running OS exposes.
 * Every operation consults this module instead of comparing versions itself.
 */
export enum CapabilityTier {
    UNSUPPORTED = 'unsupported',
    SETTINGS_ONLY = 'settings_only',
    DIRECT_INSTALL = 'direct_install',
}

export enum Feature {
    SUBSCRIPTION_LISTING = 'subscription_listing',
    EUICC_MANAGEMENT = 'euicc_management',
    EMBEDDED_FLAG = 'embedded_flag',
    SIM_PORT_QUERY = 'sim_port_query',
    NOT_EXPORTED_RECEIVER = 'not_exported_receiver',
    CARRIER_LISTING = 'carrier_listing',
    DIRECT_INSTALL = 'direct_install',
}

export interface OsVersion {
    major: number;
    minor: number;
    patch: number;
}

/**
 * Minimum OS version per feature. A missing entry means the platform never has it.
 */
const FEATURE_MINIMUMS: Record<DevicePlatform, Partial<Record<Feature, OsVersion>>> = {
    [DevicePlatform.ANDROID]: {
        [Feature.SUBSCRIPTION_LISTING]: { major: 22, minor: 0, patch: 0 },  // LOLLIPOP_MR1
        [Feature.EUICC_MANAGEMENT]: { major: 28, minor: 0, patch: 0 },      // P
        [Feature.EMBEDDED_FLAG]: { major: 28, minor: 0, patch: 0 },
        [Feature.DIRECT_INSTALL]: { major: 28, minor: 0, patch: 0 },
        [Feature.SIM_PORT_QUERY]: { major: 33, minor: 0, patch: 0 },        // TIRAMISU
        [Feature.NOT_EXPORTED_RECEIVER]: { major: 33, minor: 0, patch: 0 },
    },
    [DevicePlatform.IOS]: {
        [Feature.CARRIER_LISTING]: { major: 12, minor: 0, patch: 0 },
        [Feature.EUICC_MANAGEMENT]: { major: 12, minor: 0, patch: 0 },
        [Feature.DIRECT_INSTALL]: { major: 17, minor: 4, patch: 0 },
    },
};

/**
 * Parses "33", "17.4" or "17.4.1". Returns null for anything else.
 */
export function parseOsVersion(raw: string): OsVersion | null {
    const match = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?$/.exec(raw.trim());
    if (!match) return null;

    return {
        major: parseInt(match[1], 10),
        minor: match[2] !== undefined ? parseInt(match[2], 10) : 0,
        patch: match[3] !== undefined ? parseInt(match[3], 10) : 0,
    };
}

export function compareOsVersions(a: OsVersion, b: OsVersion): number {
    if (a.major !== b.major) return a.major - b.major;
    if (a.minor !== b.minor) return a.minor - b.minor;
    return a.patch - b.patch;
}

export function supportsFeature(profile: DeviceProfile, feature: Feature): boolean {
    const minimum = FEATURE_MINIMUMS[profile.platform][feature];
    const version = parseOsVersion(profile.osVersion);
    if (!minimum || !version) return false;

    return compareOsVersions(version, minimum) >= 0;
}

export function classifyTier(profile: DeviceProfile): CapabilityTier {
    if (supportsFeature(profile, Feature.DIRECT_INSTALL)) {
        return CapabilityTier.DIRECT_INSTALL;
    }
    if (supportsFeature(profile, Feature.EUICC_MANAGEMENT)) {
        return CapabilityTier.SETTINGS_ONLY;
    }
    return CapabilityTier.UNSUPPORTED;
}
