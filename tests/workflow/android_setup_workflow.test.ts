import { CallbackRegistry } from '../../src/domain/callback_registry';
import {
    ACTION_DOWNLOAD_SUBSCRIPTION,
    ACTION_MANAGE_EMBEDDED_SUBSCRIPTIONS,
    DownloadCallbackEvent,
    FLAG_ACTIVITY_NEW_TASK,
} from '../../src/domain/gateways';
import { SetupOutcome } from '../../src/domain/models';
import {
    DOWNLOAD_RESULT_ERROR,
    DOWNLOAD_RESULT_OK,
    DOWNLOAD_RESULT_RESOLVABLE_ERROR,
} from '../../src/domain/outcome';
import { SimulatedAndroidDevice } from '../../src/infrastructure/simulated_android_device';
import { runAndroidSetupWorkflow } from '../../src/workflow/android_setup_workflow';

const CODE = 'LPA:1$smdp.example.com$MATCHING-ID-1';

async function waitFor(condition: () => boolean): Promise<void> {
    for (let i = 0; i < 100; i++) {
        if (condition()) return;
        await new Promise(resolve => setImmediate(resolve));
    }
    throw new Error('Condition not met');
}

describe('runAndroidSetupWorkflow', () => {
    let registry: CallbackRegistry<DownloadCallbackEvent>;
    let tokens: number;
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;

    const createToken = () => `tok-${++tokens}`;

    const run = (device: SimulatedAndroidDevice, activationCode?: string, timeoutMs?: number) =>
        runAndroidSetupWorkflow(
            { activationCode },
            { device: device.connect(registry), registry, createToken, timeoutMs }
        );

    beforeEach(() => {
        registry = new CallbackRegistry<DownloadCallbackEvent>();
        tokens = 0;
        logSpy = jest.spyOn(console, 'log').mockImplementation();
        warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    });

    afterEach(() => {
        logSpy.mockRestore();
        warnSpy.mockRestore();
    });

    describe('gates', () => {
        test('version gate: below API 28 is unsupported and nothing is attempted', async () => {
            const device = new SimulatedAndroidDevice({ sdkInt: 27 });

            expect(await run(device, CODE)).toBe(SetupOutcome.UNSUPPORTED);
            expect(device.downloads).toHaveLength(0);
            expect(device.launches).toHaveLength(0);
        });

        test('service gate: missing or disabled service is unsupported', async () => {
            expect(await run(new SimulatedAndroidDevice({ hasEuiccService: false }), CODE)).toBe(SetupOutcome.UNSUPPORTED);
            expect(await run(new SimulatedAndroidDevice({ euiccEnabled: false }), CODE)).toBe(SetupOutcome.UNSUPPORTED);
        });

        test('version gate wins over the input gate', async () => {
            expect(await run(new SimulatedAndroidDevice({ sdkInt: 25 }))).toBe(SetupOutcome.UNSUPPORTED);
        });

        test.each([undefined, ''])('input gate: activation code %p fails without touching the OS', async (code) => {
            const device = new SimulatedAndroidDevice();

            expect(await run(device, code)).toBe(SetupOutcome.FAIL);
            expect(device.downloads).toHaveLength(0);
            expect(device.launches).toHaveLength(0);
            expect(device.clipboard).toHaveLength(0);
        });
    });

    describe('direct download', () => {
        test('OS success maps to success and releases the registration', async () => {
            const device = new SimulatedAndroidDevice({ sdkInt: 34 });

            expect(await run(device, CODE)).toBe(SetupOutcome.SUCCESS);
            expect(device.downloads).toEqual([{
                subscription: {
                    encodedActivationCode: CODE,
                    smdpAddress: 'smdp.example.com',
                    matchingId: 'MATCHING-ID-1',
                    confirmationCodeRequired: false,
                },
                switchAfterDownload: true,
                callback: { token: 'tok-1', action: ACTION_DOWNLOAD_SUBSCRIPTION, exported: false },
            }]);
            expect(registry.pendingCount()).toBe(0);
        });

        test('callback receivers are exported below API 33', async () => {
            const device = new SimulatedAndroidDevice({ sdkInt: 30 });
            await run(device, CODE);

            expect(device.downloads[0].callback.exported).toBe(true);
        });

        test('resolvable error with a foreground activity starts the consent flow', async () => {
            const device = new SimulatedAndroidDevice({
                downloadResult: { resultCode: DOWNLOAD_RESULT_RESOLVABLE_ERROR, resolution: { id: 'res-1' } },
            });

            expect(await run(device, CODE)).toBe(SetupOutcome.SETTINGS_OPENED);
            expect(device.launches).toEqual([{
                context: { kind: 'activity', id: 'MainActivity' },
                resolution: { id: 'res-1' },
            }]);
            expect(registry.pendingCount()).toBe(0);
        });

        test('resolvable error without a foreground activity fails', async () => {
            const device = new SimulatedAndroidDevice({
                foregroundActivity: null,
                downloadResult: { resultCode: DOWNLOAD_RESULT_RESOLVABLE_ERROR, resolution: { id: 'res-1' } },
            });

            expect(await run(device, CODE)).toBe(SetupOutcome.FAIL);
            expect(device.launches).toHaveLength(0);
        });

        test('resolvable error without a resolution intent fails', async () => {
            const device = new SimulatedAndroidDevice({
                downloadResult: { resultCode: DOWNLOAD_RESULT_RESOLVABLE_ERROR },
            });

            expect(await run(device, CODE)).toBe(SetupOutcome.FAIL);
        });

        test('a resolution activity that fails to start fails', async () => {
            const device = new SimulatedAndroidDevice({
                downloadResult: { resultCode: DOWNLOAD_RESULT_RESOLVABLE_ERROR, resolution: { id: 'res-1' } },
            }).failOn('startResolutionActivity', new Error('activity not found'));

            expect(await run(device, CODE)).toBe(SetupOutcome.FAIL);
        });

        test.each([DOWNLOAD_RESULT_ERROR, 99])('result code %i fails', async (resultCode) => {
            const device = new SimulatedAndroidDevice({ downloadResult: { resultCode } });

            expect(await run(device, CODE)).toBe(SetupOutcome.FAIL);
            expect(device.clipboard).toHaveLength(0);
        });

        test('a callback fired twice is delivered once', async () => {
            const device = new SimulatedAndroidDevice({ downloadResult: 'none' });
            const pending = run(device, CODE);

            await waitFor(() => device.downloads.length === 1);
            expect(registry.pendingCount()).toBe(1);

            expect(device.deliver('tok-1', { resultCode: DOWNLOAD_RESULT_OK })).toBe('delivered');
            expect(device.deliver('tok-1', { resultCode: DOWNLOAD_RESULT_ERROR })).toBe('already_consumed');

            expect(await pending).toBe(SetupOutcome.SUCCESS);
            expect(registry.pendingCount()).toBe(0);
        });

        test('concurrent setups hold separate registrations', async () => {
            const device = new SimulatedAndroidDevice({ downloadResult: 'none' });
            const otherCode = 'LPA:1$smdp.example.com$MATCHING-ID-2';
            const first = run(device, CODE);
            const second = run(device, otherCode);

            await waitFor(() => device.downloads.length === 2);
            expect(registry.pendingCount()).toBe(2);

            const tokenFor = (code: string) =>
                device.downloads.find(d => d.subscription.encodedActivationCode === code)?.callback.token ?? '';
            expect(tokenFor(CODE)).not.toBe(tokenFor(otherCode));

            device.deliver(tokenFor(otherCode), { resultCode: DOWNLOAD_RESULT_ERROR });
            device.deliver(tokenFor(CODE), { resultCode: DOWNLOAD_RESULT_OK });

            expect(await first).toBe(SetupOutcome.SUCCESS);
            expect(await second).toBe(SetupOutcome.FAIL);
        });

        test('timeout gives up with unknown and leaves nothing registered', async () => {
            const device = new SimulatedAndroidDevice({ downloadResult: 'none' });

            expect(await run(device, CODE, 20)).toBe(SetupOutcome.UNKNOWN);
            expect(registry.pendingCount()).toBe(0);
            expect(device.deliver('tok-1', { resultCode: DOWNLOAD_RESULT_OK })).toBe('already_consumed');
        });
    });

    describe('fallback', () => {
        const managementIntent = { action: ACTION_MANAGE_EMBEDDED_SUBSCRIPTIONS, flags: [FLAG_ACTIVITY_NEW_TASK] };

        test('a malformed code goes to clipboard and settings through the foreground activity', async () => {
            const device = new SimulatedAndroidDevice();

            expect(await run(device, 'not-an-lpa-code')).toBe(SetupOutcome.SETTINGS_OPENED);
            expect(device.downloads).toHaveLength(0);
            expect(device.clipboard).toEqual([{ label: 'eSIM Activation Code', text: 'not-an-lpa-code' }]);
            expect(device.launches).toEqual([{ context: { kind: 'activity', id: 'MainActivity' }, intent: managementIntent }]);
        });

        test('a submission that throws releases its registration and falls back', async () => {
            const device = new SimulatedAndroidDevice().failOn('downloadSubscription', new Error('euicc busy'));

            expect(await run(device, CODE)).toBe(SetupOutcome.SETTINGS_OPENED);
            expect(registry.pendingCount()).toBe(0);
            expect(registry.dispatch('tok-1', { resultCode: DOWNLOAD_RESULT_OK })).toBe('already_consumed');
            expect(device.clipboard).toEqual([{ label: 'eSIM Activation Code', text: CODE }]);
        });

        test('a registration that cannot be made falls back', async () => {
            const device = new SimulatedAndroidDevice();
            registry.register('tok-1', jest.fn());

            expect(await run(device, CODE)).toBe(SetupOutcome.SETTINGS_OPENED);
            expect(device.downloads).toHaveLength(0);
            expect(registry.pendingCount()).toBe(1);
        });

        test('without a foreground activity the application context launches settings', async () => {
            const device = new SimulatedAndroidDevice({ foregroundActivity: null })
                .failOn('downloadSubscription', new Error('euicc busy'));

            expect(await run(device, CODE)).toBe(SetupOutcome.SETTINGS_OPENED);
            expect(device.launches).toEqual([{ context: { kind: 'application', id: 'application' }, intent: managementIntent }]);
        });

        test('clipboard failure does not stop the settings launch', async () => {
            const device = new SimulatedAndroidDevice()
                .failOn('downloadSubscription', new Error('euicc busy'))
                .failOn('setPrimaryClip', new Error('clipboard locked'));

            expect(await run(device, CODE)).toBe(SetupOutcome.SETTINGS_OPENED);
            expect(device.clipboard).toHaveLength(0);
            expect(device.launches).toHaveLength(1);
        });

        test('a settings launch that throws fails', async () => {
            const device = new SimulatedAndroidDevice()
                .failOn('downloadSubscription', new Error('euicc busy'))
                .failOn('startActivity', new Error('no activity'));

            expect(await run(device, CODE)).toBe(SetupOutcome.FAIL);
        });
    });
});
