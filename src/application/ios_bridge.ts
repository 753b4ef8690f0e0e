import { CapabilityTier, Feature, classifyTier, supportsFeature } from '../domain/capability_tier';
import { CarrierInfo, IosPlatformGateway } from '../domain/gateways';
import { CapabilityReport, DevicePlatform, DeviceProfile, SetupOutcome, SubscriptionRecord } from '../domain/models';
import { probe } from '../domain/probe';
import { EsimBridge } from './esim_bridge';

export const UNIVERSAL_LINK_BASE = 'https://esimsetup.apple.com/esim_qrcode_provisioning?carddata=';
export const CELLULAR_SETUP_BASE = 'cellular-setup://esim?carddata=';
export const CELLULAR_SETTINGS_URL = 'App-prefs:MOBILE_DATA_SETTINGS_ID';

/**
 * Percent-encodes an activation code for a query value.
 * `$` and `:` stay literal, the way iOS encodes them for the query component.
 */
export function encodeCardData(activationCode: string): string {
    return encodeURIComponent(activationCode)
        .replace(/%24/g, '$')
        .replace(/%3A/g, ':');
}

export class IosEsimBridge implements EsimBridge {
    constructor(private readonly device: IosPlatformGateway) { }

    async isEsimSupported(): Promise<boolean> {
        const profile = await this.resolveProfile();
        if (!profile || !supportsFeature(profile, Feature.EUICC_MANAGEMENT)) return false;

        const supported = await probe(() => this.device.supportsCellularPlan());
        return supported.status === 'success' && supported.data;
    }

    async getEsimCapability(): Promise<CapabilityReport> {
        const profile = await this.resolveProfile();
        if (!profile) {
            return this.report(false, 'Unable to read the iOS version');
        }
        if (!supportsFeature(profile, Feature.EUICC_MANAGEMENT)) {
            return this.report(false, 'Requires iOS 12.0 or later');
        }

        const supported = await probe(() => this.device.supportsCellularPlan());
        if (supported.status !== 'success') {
            return this.report(false, 'CoreTelephony provisioning service not available on this device');
        }

        const report = supported.data
            ? this.report(true, 'Device supports eSIM via CoreTelephony')
            : this.report(false, 'Device hardware does not support eSIM');

        const activePlans = await this.listCarriers(profile);
        return activePlans.length > 0 ? { ...report, activePlans } : report;
    }

    async getActivePlans(): Promise<SubscriptionRecord[]> {
        const profile = await this.resolveProfile();
        if (!profile) return [];
        return this.listCarriers(profile);
    }

    async openEsimSetup(activationCode?: string): Promise<SetupOutcome> {
        const profile = await this.resolveProfile();
        if (!profile || classifyTier(profile) !== CapabilityTier.DIRECT_INSTALL) {
            // Older releases only have the settings path, which this contract does not take
            return SetupOutcome.UNSUPPORTED;
        }
        if (!activationCode) {
            return SetupOutcome.FAIL;
        }

        const opened = await probe(() => this.device.openUrl(UNIVERSAL_LINK_BASE + encodeCardData(activationCode)));
        if (opened.status === 'degraded') {
            console.warn(`[Setup] Universal link failed to open: ${opened.error.message}`);
            return SetupOutcome.FAIL;
        }
        return opened.status === 'success' && opened.data ? SetupOutcome.SETTINGS_OPENED : SetupOutcome.FAIL;
    }

    async openCellularSettings(activationCode?: string): Promise<boolean> {
        const profile = await this.resolveProfile();

        if (activationCode && profile && classifyTier(profile) === CapabilityTier.DIRECT_INSTALL) {
            const url = CELLULAR_SETUP_BASE + encodeCardData(activationCode);
            const canOpen = await probe(() => this.device.canOpenUrl(url));
            if (canOpen.status === 'success' && canOpen.data) {
                const opened = await probe(() => this.device.openUrl(url));
                if (opened.status === 'success' && opened.data) return true;
            }
        }

        const settings = await probe(() => this.device.openUrl(CELLULAR_SETTINGS_URL));
        return settings.status === 'success' && settings.data;
    }

    private async listCarriers(profile: DeviceProfile): Promise<SubscriptionRecord[]> {
        if (!supportsFeature(profile, Feature.CARRIER_LISTING)) return [];

        const carriers = await probe(() => this.device.serviceSubscriberCellularProviders());
        if (carriers.status === 'degraded') {
            console.warn(`[Plans] Carrier enumeration failed: ${carriers.error.message}`);
            return [];
        }
        if (carriers.status === 'empty') return [];

        return Object.entries(carriers.data).map(([slot, carrier]) => this.toRecord(slot, carrier));
    }

    private async resolveProfile(): Promise<DeviceProfile | null> {
        const version = await probe(() => this.device.getSystemVersion());
        if (version.status !== 'success') {
            if (version.status === 'degraded') {
                console.warn(`[Capability] iOS version unavailable: ${version.error.message}`);
            }
            return null;
        }
        return { platform: DevicePlatform.IOS, osVersion: version.data };
    }

    private report(isSupported: boolean, reason: string): CapabilityReport {
        return { platform: DevicePlatform.IOS, isSupported, reason };
    }

    private toRecord(slot: string, carrier: CarrierInfo): SubscriptionRecord {
        return {
            slot,
            ...(carrier.carrierName !== null ? { carrierName: carrier.carrierName } : {}),
            ...(carrier.mobileCountryCode !== null ? { mobileCountryCode: carrier.mobileCountryCode } : {}),
            ...(carrier.mobileNetworkCode !== null ? { mobileNetworkCode: carrier.mobileNetworkCode } : {}),
            ...(carrier.isoCountryCode !== null ? { isoCountryCode: carrier.isoCountryCode } : {}),
            allowsVoip: carrier.allowsVoip,
        };
    }
}
