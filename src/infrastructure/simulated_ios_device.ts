import { CarrierInfo, IosPlatformGateway } from '../domain/gateways';

export interface SimulatedIosState {
    systemVersion: string;
    supportsCellularPlan: boolean;
    carriers: Record<string, CarrierInfo> | null;

    /**
     * URL prefixes the simulated UIApplication can open.
     */
    openableSchemes: string[];
}

export type IosCall = 'getSystemVersion' | 'supportsCellularPlan' | 'serviceSubscriberCellularProviders' | 'openUrl';

const DEFAULT_STATE: SimulatedIosState = {
    systemVersion: '17.5',
    supportsCellularPlan: true,
    carriers: null,
    openableSchemes: ['https:', 'cellular-setup:', 'App-prefs:'],
};

export class SimulatedIosDevice implements IosPlatformGateway {
    readonly state: SimulatedIosState;
    readonly openedUrls: string[] = [];

    private faults: Map<IosCall, Error> = new Map();

    constructor(state: Partial<SimulatedIosState> = {}) {
        this.state = { ...DEFAULT_STATE, ...state };
    }

    failOn(call: IosCall, error: Error): this {
        this.faults.set(call, error);
        return this;
    }

    async getSystemVersion(): Promise<string> {
        this.raiseFault('getSystemVersion');
        return this.state.systemVersion;
    }

    async supportsCellularPlan(): Promise<boolean> {
        this.raiseFault('supportsCellularPlan');
        return this.state.supportsCellularPlan;
    }

    async serviceSubscriberCellularProviders(): Promise<Record<string, CarrierInfo> | null> {
        this.raiseFault('serviceSubscriberCellularProviders');
        return this.state.carriers ? { ...this.state.carriers } : null;
    }

    async canOpenUrl(url: string): Promise<boolean> {
        return this.state.openableSchemes.some(scheme => url.startsWith(scheme));
    }

    async openUrl(url: string): Promise<boolean> {
        this.raiseFault('openUrl');
        if (!(await this.canOpenUrl(url))) return false;
        this.openedUrls.push(url);
        return true;
    }

    private raiseFault(call: IosCall): void {
        const fault = this.faults.get(call);
        if (fault) throw fault;
    }
}
