import { CallbackRegistry } from '../domain/callback_registry';
import { UnsupportedPlatformError } from '../domain/errors';
import { AndroidPlatformGateway, DownloadCallbackEvent, IosPlatformGateway } from '../domain/gateways';
import { CapabilityReport, DevicePlatform, HostPlatform, SetupOutcome, SubscriptionRecord } from '../domain/models';
import { AndroidEsimBridge } from './android_bridge';
import { IosEsimBridge } from './ios_bridge';

/**
 * Platform-agnostic eSIM surface. No operation ever rejects.
 *
 * Concurrent openEsimSetup calls each hold their own callback registration;
 * the bridge does not serialize them.
 */
export interface EsimBridge {
    isEsimSupported(): Promise<boolean>;
    getEsimCapability(): Promise<CapabilityReport>;
    getActivePlans(): Promise<SubscriptionRecord[]>;

    /**
     * Installs a profile from an LPA activation code: LPA:1$<SMDP_ADDRESS>$<MATCHING_ID>
     */
    openEsimSetup(activationCode?: string): Promise<SetupOutcome>;

    /**
     * Opens the system cellular/eSIM screen; true when a screen was opened.
     * Works without an activation code.
     */
    openCellularSettings(activationCode?: string): Promise<boolean>;
}

/**
 * Hosts without an eSIM service (web, desktop): fixed answers, no probing.
 */
export class UnsupportedHostBridge implements EsimBridge {
    async isEsimSupported(): Promise<boolean> {
        return false;
    }

    async getEsimCapability(): Promise<CapabilityReport> {
        return {
            platform: DevicePlatform.IOS,
            isSupported: false,
            reason: 'eSIM is not supported on this platform',
        };
    }

    async getActivePlans(): Promise<SubscriptionRecord[]> {
        return [];
    }

    async openEsimSetup(): Promise<SetupOutcome> {
        return SetupOutcome.FAIL;
    }

    async openCellularSettings(): Promise<boolean> {
        return false;
    }
}

export interface BridgeOptions {
    platform: HostPlatform;
    android?: AndroidPlatformGateway;
    ios?: IosPlatformGateway;
    registry?: CallbackRegistry<DownloadCallbackEvent>;
    setupTimeoutMs?: number;
    createToken?: () => string;
}

export function createEsimBridge(options: BridgeOptions): EsimBridge {
    switch (options.platform) {
        case 'android':
            if (!options.android) {
                throw new UnsupportedPlatformError('Android bridge requires an Android gateway');
            }
            return new AndroidEsimBridge(
                options.android,
                options.registry ?? new CallbackRegistry<DownloadCallbackEvent>(),
                { setupTimeoutMs: options.setupTimeoutMs, createToken: options.createToken }
            );

        case 'ios':
            if (!options.ios) {
                throw new UnsupportedPlatformError('iOS bridge requires an iOS gateway');
            }
            return new IosEsimBridge(options.ios);

        default:
            return new UnsupportedHostBridge();
    }
}
