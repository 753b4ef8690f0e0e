import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { BridgeRuntime, buildRuntime, createBridgeApp } from '../../src/bridge_server';
import { EsimBridge } from '../../src/application/esim_bridge';
import { DownloadCallbackHandler } from '../../src/application/download_callback_handler';
import { BridgeConfig } from '../../src/config';
import { CallbackRegistry } from '../../src/domain/callback_registry';
import { DeviceAgentApiError } from '../../src/domain/errors';
import { DownloadCallbackEvent } from '../../src/domain/gateways';

describe('Bridge server', () => {
    let server: Server;
    let http: AxiosInstance;
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    const listen = async (runtime: BridgeRuntime, config: BridgeConfig): Promise<void> => {
        const app = createBridgeApp(runtime, { platform: config.platform, deviceMode: config.deviceMode });

        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, () => resolve(listening));
        });
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : 0;
        http = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
    };

    const startWith = async (config: BridgeConfig): Promise<BridgeRuntime> => {
        const runtime = buildRuntime(config);
        await listen(runtime, config);
        return runtime;
    };

    const androidConfig: BridgeConfig = {
        port: 3000,
        platform: 'android',
        deviceMode: 'SIMULATED',
        publicUrl: 'http://localhost:3000',
    };

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation();
        warnSpy = jest.spyOn(console, 'warn').mockImplementation();
        errorSpy = jest.spyOn(console, 'error').mockImplementation();
    });

    afterEach(async () => {
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        logSpy.mockRestore();
        warnSpy.mockRestore();
        errorSpy.mockRestore();
    });

    test('GET /health reports the wiring', async () => {
        await startWith(androidConfig);
        const response = await http.get('/health');

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ status: 'ok', platform: 'android', deviceMode: 'SIMULATED' });
    });

    test('GET /esim/capability and /esim/supported on a simulated Android device', async () => {
        await startWith(androidConfig);

        expect((await http.get('/esim/supported')).data).toEqual({ supported: true });
        expect((await http.get('/esim/capability')).data).toEqual({
            platform: 'android',
            isSupported: true,
            reason: 'Device supports eSIM via EuiccManager',
            firmwareVersion: '2.3.0',
            portAvailable: true,
        });
        expect((await http.get('/esim/plans')).data).toEqual({ plans: [] });
    });

    test('SIMULATED_OS_VERSION sets the simulated API level', async () => {
        await startWith({ ...androidConfig, simulatedOsVersion: '27' });

        expect((await http.get('/esim/capability')).data).toEqual({
            platform: 'android',
            isSupported: false,
            reason: 'Requires Android 9 (API 28) or later',
        });
    });

    test('POST /esim/setup installs through the simulated OS', async () => {
        await startWith(androidConfig);
        const response = await http.post('/esim/setup', { activationCode: 'LPA:1$smdp.example.com$ABC' });

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ outcome: 'success' });
        expect(logSpy).toHaveBeenCalledWith('📶 [Bridge Server] Setup finished: success');
    });

    test('POST /esim/setup without a code fails, with a non-string code is rejected', async () => {
        await startWith(androidConfig);

        expect((await http.post('/esim/setup', {})).data).toEqual({ outcome: 'fail' });

        const bad = await http.post('/esim/setup', { activationCode: 42 });
        expect(bad.status).toBe(400);
        expect(bad.data).toEqual({ error: 'activationCode must be a string' });
    });

    test('POST /esim/settings on iOS opens the settings screen', async () => {
        await startWith({ ...androidConfig, platform: 'ios', simulatedOsVersion: '16.2' });

        expect((await http.post('/esim/settings', {})).data).toEqual({ opened: true });
    });

    test('web hosts answer with the fixed unsupported report', async () => {
        await startWith({ ...androidConfig, platform: 'web' });

        expect((await http.get('/esim/capability')).data).toEqual({
            platform: 'ios',
            isSupported: false,
            reason: 'eSIM is not supported on this platform',
        });
    });

    test('POST /callbacks/download/:token answers 200 for tokens nobody holds', async () => {
        await startWith(androidConfig);
        const first = await http.post('/callbacks/download/tok-x', { resultCode: 0 });

        expect(first.status).toBe(200);
        expect(first.data).toEqual({ result: 'unknown_token' });
        expect(warnSpy).toHaveBeenCalledWith('[Callbacks] UNKNOWN TOKEN: tok-x');
    });

    test('POST /callbacks/download/:token rejects malformed payloads', async () => {
        await startWith(androidConfig);
        const response = await http.post('/callbacks/download/tok-x', { resultCode: 'ok' });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({ error: 'resultCode must be an integer' });
        expect(errorSpy).toHaveBeenCalledWith('❌ [Bridge Server] Bad callback payload: resultCode must be an integer');
    });

    test('a bridge call that rejects answers 500 instead of leaving the request open', async () => {
        const failure = new DeviceAgentApiError('Malformed agent response from /android/build: sdkInt must be an integer', 200);
        const bridge: EsimBridge = {
            isEsimSupported: () => Promise.reject(failure),
            getEsimCapability: () => Promise.reject(failure),
            getActivePlans: () => Promise.reject(failure),
            openEsimSetup: () => Promise.reject(failure),
            openCellularSettings: () => Promise.reject(failure),
        };
        const callbacks = new DownloadCallbackHandler(new CallbackRegistry<DownloadCallbackEvent>());
        await listen({ bridge, callbacks }, androidConfig);

        const expected = { error: 'Malformed agent response from /android/build: sdkInt must be an integer' };
        for (const response of [
            await http.get('/esim/supported'),
            await http.get('/esim/capability'),
            await http.get('/esim/plans'),
            await http.post('/esim/setup', { activationCode: 'LPA:1$smdp.example.com$ABC' }),
            await http.post('/esim/settings', {}),
        ]) {
            expect(response.status).toBe(500);
            expect(response.data).toEqual(expected);
        }
        expect(errorSpy).toHaveBeenCalledTimes(5);
        expect(errorSpy).toHaveBeenCalledWith('❌ [Bridge Server] Error:', expected.error);
    });
});
