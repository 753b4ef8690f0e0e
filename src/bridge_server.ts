import express, { Express, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { DeviceAgentClient } from './api/device_agent_client';
import { DownloadCallbackHandler, parseDownloadCallback } from './application/download_callback_handler';
import { EsimBridge, createEsimBridge } from './application/esim_bridge';
import { BridgeConfig, loadBridgeConfig, loadEnvFile } from './config';
import { CallbackRegistry } from './domain/callback_registry';
import { describeError } from './domain/errors';
import { AndroidPlatformGateway, DownloadCallbackEvent, IosPlatformGateway } from './domain/gateways';
import { SimulatedAndroidDevice } from './infrastructure/simulated_android_device';
import { SimulatedIosDevice } from './infrastructure/simulated_ios_device';

export interface BridgeRuntime {
    bridge: EsimBridge;
    callbacks: DownloadCallbackHandler;
}

function readActivationCode(body: unknown): string | undefined | null {
    if (typeof body !== 'object' || body === null) return undefined;
    const code: unknown = Reflect.get(body, 'activationCode');
    if (code === undefined || code === null) return undefined;
    return typeof code === 'string' ? code : null;
}

function respondWithError(res: Response, error: unknown): void {
    const message = describeError(error);
    console.error('❌ [Bridge Server] Error:', message);
    res.status(500).json({ error: message });
}

/**
 * Wires gateways for the configured platform and device mode.
 */
export function buildRuntime(config: BridgeConfig): BridgeRuntime {
    const registry = new CallbackRegistry<DownloadCallbackEvent>();

    let android: AndroidPlatformGateway | undefined;
    let ios: IosPlatformGateway | undefined;

    if (config.deviceMode === 'AGENT' && config.agent) {
        const client = new DeviceAgentClient(config.agent.url, config.agent.token, config.publicUrl);
        android = client.android();
        ios = client.ios();
    } else {
        const sdkInt = config.simulatedOsVersion ? parseInt(config.simulatedOsVersion, 10) : NaN;
        android = new SimulatedAndroidDevice(isNaN(sdkInt) ? {} : { sdkInt }).connect(registry);
        ios = new SimulatedIosDevice(config.simulatedOsVersion ? { systemVersion: config.simulatedOsVersion } : {});
    }

    return {
        bridge: createEsimBridge({
            platform: config.platform,
            android,
            ios,
            registry,
            setupTimeoutMs: config.setupTimeoutMs,
        }),
        callbacks: new DownloadCallbackHandler(registry),
    };
}

export function createBridgeApp(runtime: BridgeRuntime, meta: { platform: string; deviceMode: string }): Express {
    const { bridge, callbacks } = runtime;
    const app = express();

    app.use(bodyParser.json());

    app.get('/health', (_req: Request, res: Response) => {
        res.status(200).json({ status: 'ok', ...meta });
    });

    app.get('/esim/supported', async (_req: Request, res: Response) => {
        try {
            res.status(200).json({ supported: await bridge.isEsimSupported() });
        } catch (error: unknown) {
            respondWithError(res, error);
        }
    });

    app.get('/esim/capability', async (_req: Request, res: Response) => {
        try {
            res.status(200).json(await bridge.getEsimCapability());
        } catch (error: unknown) {
            respondWithError(res, error);
        }
    });

    app.get('/esim/plans', async (_req: Request, res: Response) => {
        try {
            res.status(200).json({ plans: await bridge.getActivePlans() });
        } catch (error: unknown) {
            respondWithError(res, error);
        }
    });

    app.post('/esim/setup', async (req: Request, res: Response) => {
        const activationCode = readActivationCode(req.body);
        if (activationCode === null) {
            res.status(400).json({ error: 'activationCode must be a string' });
            return;
        }

        try {
            const outcome = await bridge.openEsimSetup(activationCode);
            console.log(`📶 [Bridge Server] Setup finished: ${outcome}`);
            res.status(200).json({ outcome });
        } catch (error: unknown) {
            respondWithError(res, error);
        }
    });

    app.post('/esim/settings', async (req: Request, res: Response) => {
        const activationCode = readActivationCode(req.body);
        if (activationCode === null) {
            res.status(400).json({ error: 'activationCode must be a string' });
            return;
        }

        try {
            res.status(200).json({ opened: await bridge.openCellularSettings(activationCode) });
        } catch (error: unknown) {
            respondWithError(res, error);
        }
    });

    app.post('/callbacks/download/:token', (req: Request, res: Response) => {
        const parsed = parseDownloadCallback(req.body);
        if (parsed.status === 'failure') {
            console.error(`❌ [Bridge Server] Bad callback payload: ${parsed.error.message}`);
            res.status(400).json({ error: parsed.error.message });
            return;
        }

        try {
            // Always 200 for well-formed payloads so the agent does not retry a consumed token
            const result = callbacks.handle(req.params.token, parsed.event);
            res.status(200).json({ result });
        } catch (error: unknown) {
            respondWithError(res, error);
        }
    });

    return app;
}

function main(): void {
    // 1. Load Config Early
    loadEnvFile();

    // 2. Fail-Fast Validation
    let config: BridgeConfig;
    try {
        config = loadBridgeConfig();
    } catch (error: unknown) {
        console.error(`❌ STARTUP FATAL: ${describeError(error)}`);
        process.exit(1);
    }

    // Infrastructure Wiring
    const runtime = buildRuntime(config);
    const app = createBridgeApp(runtime, { platform: config.platform, deviceMode: config.deviceMode });

    app.listen(config.port, () => {
        console.log(`
🚀 eSIM Bridge listening on http://localhost:${config.port} [${config.platform} / ${config.deviceMode}]
👉 Device callbacks: ${config.publicUrl}/callbacks/download/:token
    `);
    });
}

if (require.main === module) {
    main();
}
