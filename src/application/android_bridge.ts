import { CallbackRegistry } from '../domain/callback_registry';
import { Feature, supportsFeature } from '../domain/capability_tier';
import { PermissionDeniedError } from '../domain/errors';
import { AndroidPlatformGateway, DownloadCallbackEvent, SubscriptionInfo } from '../domain/gateways';
import { CapabilityReport, DevicePlatform, DeviceProfile, SetupOutcome, SubscriptionRecord } from '../domain/models';
import { toOpenedFlag } from '../domain/outcome';
import { probe } from '../domain/probe';
import { openManagementScreen, runAndroidSetupWorkflow } from '../workflow/android_setup_workflow';
import { EsimBridge } from './esim_bridge';

export interface AndroidBridgeOptions {
    setupTimeoutMs?: number;
    createToken?: () => string;
}

const SIM_PORT_INDEX = 0;

export class AndroidEsimBridge implements EsimBridge {
    constructor(
        private readonly device: AndroidPlatformGateway,
        private readonly registry: CallbackRegistry<DownloadCallbackEvent>,
        private readonly options: AndroidBridgeOptions = {}
    ) { }

    async isEsimSupported(): Promise<boolean> {
        const profile = await this.resolveProfile();
        if (!profile || !supportsFeature(profile, Feature.EUICC_MANAGEMENT)) return false;

        const service = await probe(() => this.device.getEuiccService());
        if (service.status !== 'success') return false;

        const enabled = await probe(() => service.data.isEnabled());
        return enabled.status === 'success' && enabled.data;
    }

    async getEsimCapability(): Promise<CapabilityReport> {
        const profile = await this.resolveProfile();
        if (!profile) {
            return this.report(false, 'Unable to read the Android API level');
        }
        if (!supportsFeature(profile, Feature.EUICC_MANAGEMENT)) {
            return this.report(false, 'Requires Android 9 (API 28) or later');
        }

        const service = await probe(() => this.device.getEuiccService());
        if (service.status !== 'success') {
            return this.report(false, 'EuiccManager service not available on this device');
        }
        const euicc = service.data;

        const enabled = await probe(() => euicc.isEnabled());
        if (enabled.status !== 'success' || !enabled.data) {
            return this.report(false, 'eSIM is not enabled or not supported on this device');
        }

        // Best-effort enrichments: a failed query leaves its key out
        const info = await probe(() => euicc.getEuiccInfo());
        const firmwareVersion = info.status === 'success' ? info.data.osVersion : null;

        const port = supportsFeature(profile, Feature.SIM_PORT_QUERY)
            ? await probe(() => euicc.isSimPortAvailable(SIM_PORT_INDEX))
            : null;

        return {
            ...this.report(true, 'Device supports eSIM via EuiccManager'),
            ...(firmwareVersion ? { firmwareVersion } : {}),
            ...(port?.status === 'success' ? { portAvailable: port.data } : {}),
        };
    }

    async getActivePlans(): Promise<SubscriptionRecord[]> {
        const profile = await this.resolveProfile();
        if (!profile || !supportsFeature(profile, Feature.SUBSCRIPTION_LISTING)) return [];

        const service = await probe(() => this.device.getSubscriptionService());
        if (service.status !== 'success') return [];

        const listing = await probe(() => service.data.getActiveSubscriptionInfoList());
        switch (listing.status) {
            case 'success':
                return listing.data.map(info => this.toRecord(info, profile));
            case 'empty':
                return [];
            case 'degraded':
                if (listing.error instanceof PermissionDeniedError) {
                    console.warn('[Plans] READ_PHONE_STATE not granted, reporting no plans');
                } else {
                    console.warn(`[Plans] Subscription enumeration failed: ${listing.error.message}`);
                }
                return [];
        }
    }

    async openEsimSetup(activationCode?: string): Promise<SetupOutcome> {
        return runAndroidSetupWorkflow(
            { activationCode },
            {
                device: this.device,
                registry: this.registry,
                createToken: this.options.createToken,
                timeoutMs: this.options.setupTimeoutMs,
            }
        );
    }

    async openCellularSettings(activationCode?: string): Promise<boolean> {
        const profile = await this.resolveProfile();
        if (!profile || !supportsFeature(profile, Feature.EUICC_MANAGEMENT)) return false;

        return toOpenedFlag(await openManagementScreen(this.device, activationCode || undefined));
    }

    private async resolveProfile(): Promise<DeviceProfile | null> {
        const sdk = await probe(() => this.device.getSdkInt());
        if (sdk.status !== 'success') {
            if (sdk.status === 'degraded') {
                console.warn(`[Capability] Android API level unavailable: ${sdk.error.message}`);
            }
            return null;
        }
        return { platform: DevicePlatform.ANDROID, osVersion: String(sdk.data) };
    }

    private report(isSupported: boolean, reason: string): CapabilityReport {
        return { platform: DevicePlatform.ANDROID, isSupported, reason };
    }

    private toRecord(info: SubscriptionInfo, profile: DeviceProfile): SubscriptionRecord {
        return {
            slot: String(info.simSlotIndex),
            ...(info.carrierName !== null ? { carrierName: info.carrierName } : {}),
            ...(info.mccString !== null ? { mobileCountryCode: info.mccString } : {}),
            ...(info.mncString !== null ? { mobileNetworkCode: info.mncString } : {}),
            ...(info.countryIso !== null ? { isoCountryCode: info.countryIso } : {}),
            subscriptionId: info.subscriptionId,
            ...(supportsFeature(profile, Feature.EMBEDDED_FLAG) ? { isEmbedded: info.isEmbedded } : {}),
        };
    }
}
