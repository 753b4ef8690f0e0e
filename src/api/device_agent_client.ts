import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { DownloadableSubscription } from '../domain/activation_code';
import {
    DeviceAgentApiError,
    DeviceUnreachableError,
    OsRejectedError,
    PermissionDeniedError,
    ServiceUnavailableError,
} from '../domain/errors';
import {
    ActivityIntent,
    AndroidPlatformGateway,
    CallbackHandle,
    CarrierInfo,
    ClipboardService,
    EuiccInfo,
    EuiccService,
    IosPlatformGateway,
    LaunchContext,
    ResolutionIntent,
    SubscriptionInfo,
    SubscriptionService,
} from '../domain/gateways';

type AndroidServiceName = 'euicc' | 'subscription' | 'clipboard';

const APPLICATION_CONTEXT: LaunchContext = { kind: 'application', id: 'application' };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === 'string';
}

function stringField(data: unknown, key: 'message' | 'service', fallback: string): string {
    if (isRecord(data)) {
        const value = data[key];
        if (typeof value === 'string') return value;
    }
    return fallback;
}

// ===========================================
// Response validation
// ===========================================

function malformed(response: AxiosResponse<unknown>, detail: string): DeviceAgentApiError {
    return new DeviceAgentApiError(
        `Malformed agent response from ${response.config.url ?? 'agent'}: ${detail}`,
        response.status,
        response.data
    );
}

function fieldOf(response: AxiosResponse<unknown>, key: string): unknown {
    return isRecord(response.data) ? response.data[key] : undefined;
}

function readBoolean(response: AxiosResponse<unknown>, key: string): boolean {
    const value = fieldOf(response, key);
    if (typeof value !== 'boolean') throw malformed(response, `${key} must be a boolean`);
    return value;
}

function readInteger(response: AxiosResponse<unknown>, key: string): number {
    const value = fieldOf(response, key);
    if (typeof value !== 'number' || !Number.isInteger(value)) throw malformed(response, `${key} must be an integer`);
    return value;
}

function readString(response: AxiosResponse<unknown>, key: string): string {
    const value = fieldOf(response, key);
    if (typeof value !== 'string') throw malformed(response, `${key} must be a string`);
    return value;
}

function readNullableString(response: AxiosResponse<unknown>, key: string): string | null {
    const value = fieldOf(response, key);
    if (!isNullableString(value)) throw malformed(response, `${key} must be a string or null`);
    return value;
}

function toSubscriptionInfo(value: unknown): SubscriptionInfo | null {
    if (!isRecord(value)) return null;
    const { simSlotIndex, subscriptionId, carrierName, mccString, mncString, countryIso, isEmbedded } = value;

    if (typeof simSlotIndex !== 'number' || !Number.isInteger(simSlotIndex)) return null;
    if (typeof subscriptionId !== 'number' || !Number.isInteger(subscriptionId)) return null;
    if (!isNullableString(carrierName) || !isNullableString(mccString)) return null;
    if (!isNullableString(mncString) || !isNullableString(countryIso)) return null;
    if (typeof isEmbedded !== 'boolean') return null;

    return { simSlotIndex, subscriptionId, carrierName, mccString, mncString, countryIso, isEmbedded };
}

function toCarrierInfo(value: unknown): CarrierInfo | null {
    if (!isRecord(value)) return null;
    const { carrierName, mobileCountryCode, mobileNetworkCode, isoCountryCode, allowsVoip } = value;

    if (!isNullableString(carrierName) || !isNullableString(mobileCountryCode)) return null;
    if (!isNullableString(mobileNetworkCode) || !isNullableString(isoCountryCode)) return null;
    if (typeof allowsVoip !== 'boolean') return null;

    return { carrierName, mobileCountryCode, mobileNetworkCode, isoCountryCode, allowsVoip };
}

function readSubscriptions(response: AxiosResponse<unknown>): SubscriptionInfo[] | null {
    const value = fieldOf(response, 'subscriptions');
    if (value === null) return null;
    if (!Array.isArray(value)) throw malformed(response, 'subscriptions must be an array or null');

    return value.map((entry: unknown, index) => {
        const info = toSubscriptionInfo(entry);
        if (!info) throw malformed(response, `subscriptions[${index}] is not a subscription`);
        return info;
    });
}

function readCarriers(response: AxiosResponse<unknown>): Record<string, CarrierInfo> | null {
    const value = fieldOf(response, 'carriers');
    if (value === null) return null;
    if (!isRecord(value)) throw malformed(response, 'carriers must be an object or null');

    const carriers: Record<string, CarrierInfo> = {};
    for (const [slot, entry] of Object.entries(value)) {
        const carrier = toCarrierInfo(entry);
        if (!carrier) throw malformed(response, `carriers.${slot} is not a carrier`);
        carriers[slot] = carrier;
    }
    return carriers;
}

function readLaunchContext(response: AxiosResponse<unknown>): LaunchContext | null {
    const value = fieldOf(response, 'context');
    if (value === null) return null;

    const kind = isRecord(value) ? value.kind : undefined;
    const id = isRecord(value) ? value.id : undefined;
    if ((kind === 'activity' || kind === 'application') && typeof id === 'string') {
        return { kind, id };
    }
    throw malformed(response, 'context must be a launch context or null');
}

/**
 * HTTP client for the device agent: a companion process with access to the
 * phone's telephony APIs. Each OS call is one request.
 *
 * Every body is checked before it leaves this module; a reply of the wrong
 * shape is a DeviceAgentApiError like any other agent failure.
 */
export class DeviceAgentClient {
    private client: AxiosInstance;

    constructor(
        baseUrl: string,
        token: string,
        private readonly callbackBaseUrl: string,
        timeoutMs = 10000
    ) {
        this.client = axios.create({
            baseURL: baseUrl,
            headers: {
                'X-Agent-Token': token,
                'Content-Type': 'application/json',
            },
            timeout: timeoutMs,
        });

        this.setupInterceptors();
    }

    private setupInterceptors() {
        this.client.interceptors.response.use(
            (response) => response,
            (error: AxiosError) => {
                if (error.response) {
                    const status = error.response.status;
                    const data: unknown = error.response.data;

                    if (status === 403) {
                        throw new PermissionDeniedError(stringField(data, 'message', 'Permission denied by the device'));
                    }

                    if (status === 503) {
                        throw new ServiceUnavailableError(stringField(data, 'service', 'Device'));
                    }

                    if (status === 422) {
                        throw new OsRejectedError(stringField(data, 'message', 'Request rejected by the OS'));
                    }

                    throw new DeviceAgentApiError(
                        stringField(data, 'message', `Agent Error: ${status}`),
                        status,
                        data
                    );
                }
                throw new DeviceUnreachableError(`Device agent unreachable: ${error.message}`);
            }
        );
    }

    callbackUrl(token: string): string {
        return `${this.callbackBaseUrl.replace(/\/+$/, '')}/callbacks/download/${encodeURIComponent(token)}`;
    }

    android(): AndroidPlatformGateway {
        return new AgentAndroidGateway(this.client, (token) => this.callbackUrl(token));
    }

    ios(): IosPlatformGateway {
        return new AgentIosGateway(this.client);
    }
}

class AgentAndroidGateway implements AndroidPlatformGateway {
    constructor(
        private readonly client: AxiosInstance,
        private readonly callbackUrl: (token: string) => string
    ) { }

    async getSdkInt(): Promise<number> {
        return readInteger(await this.client.get<unknown>('/android/build'), 'sdkInt');
    }

    async getEuiccService(): Promise<EuiccService | null> {
        return await this.hasService('euicc') ? this.euiccService() : null;
    }

    async getSubscriptionService(): Promise<SubscriptionService | null> {
        if (!await this.hasService('subscription')) return null;
        return {
            getActiveSubscriptionInfoList: async () => readSubscriptions(await this.client.get<unknown>('/android/subscriptions')),
        };
    }

    async getClipboardService(): Promise<ClipboardService | null> {
        if (!await this.hasService('clipboard')) return null;
        return {
            setPrimaryClip: async (label, text) => {
                await this.client.post('/android/clipboard', { label, text });
            },
        };
    }

    async currentForegroundContext(): Promise<LaunchContext | null> {
        return readLaunchContext(await this.client.get<unknown>('/android/foreground'));
    }

    applicationContext(): LaunchContext {
        return APPLICATION_CONTEXT;
    }

    async startActivity(context: LaunchContext, intent: ActivityIntent): Promise<void> {
        await this.client.post('/android/activities', { context, intent });
    }

    private async hasService(name: AndroidServiceName): Promise<boolean> {
        return readBoolean(await this.client.get<unknown>(`/android/services/${name}`), 'available');
    }

    private euiccService(): EuiccService {
        return {
            isEnabled: async () => readBoolean(await this.client.get<unknown>('/android/euicc/enabled'), 'enabled'),

            getEuiccInfo: async (): Promise<EuiccInfo | null> => ({
                osVersion: readNullableString(await this.client.get<unknown>('/android/euicc/info'), 'osVersion'),
            }),

            isSimPortAvailable: async (portIndex) =>
                readBoolean(await this.client.get<unknown>(`/android/euicc/ports/${portIndex}`), 'available'),

            downloadSubscription: async (
                subscription: DownloadableSubscription,
                switchAfterDownload: boolean,
                callback: CallbackHandle
            ) => {
                await this.client.post('/android/euicc/downloads', {
                    activationCode: subscription.encodedActivationCode,
                    switchAfterDownload,
                    callback: { ...callback, url: this.callbackUrl(callback.token) },
                });
            },

            startResolutionActivity: async (
                context: LaunchContext,
                requestCode: number,
                resolution: ResolutionIntent,
                callback: CallbackHandle
            ) => {
                await this.client.post('/android/euicc/resolutions', {
                    context,
                    requestCode,
                    resolution,
                    callback: { ...callback, url: this.callbackUrl(callback.token) },
                });
            },
        };
    }
}

class AgentIosGateway implements IosPlatformGateway {
    constructor(private readonly client: AxiosInstance) { }

    async getSystemVersion(): Promise<string> {
        return readString(await this.client.get<unknown>('/ios/version'), 'systemVersion');
    }

    async supportsCellularPlan(): Promise<boolean> {
        return readBoolean(await this.client.get<unknown>('/ios/provisioning'), 'supportsCellularPlan');
    }

    async serviceSubscriberCellularProviders(): Promise<Record<string, CarrierInfo> | null> {
        return readCarriers(await this.client.get<unknown>('/ios/carriers'));
    }

    async canOpenUrl(url: string): Promise<boolean> {
        return readBoolean(await this.client.post<unknown>('/ios/urls/can-open', { url }), 'canOpen');
    }

    async openUrl(url: string): Promise<boolean> {
        return readBoolean(await this.client.post<unknown>('/ios/urls/open', { url }), 'opened');
    }
}
