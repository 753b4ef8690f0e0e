import * as dotenv from 'dotenv';
import { createEsimBridge } from '../src/application/esim_bridge';
import { CallbackRegistry } from '../src/domain/callback_registry';
import { DownloadCallbackEvent } from '../src/domain/gateways';
import { SimulatedAndroidDevice } from '../src/infrastructure/simulated_android_device';

dotenv.config();

async function main() {
    // 1. Configuration
    const activationCode = process.env.EXAMPLE_ACTIVATION_CODE || 'LPA:1$smdp.example.com$EXAMPLE-MATCHING-ID';
    const sdkInt = parseInt(process.env.SIMULATED_OS_VERSION || '34', 10);

    // 2. Wire a simulated phone to the bridge
    const registry = new CallbackRegistry<DownloadCallbackEvent>();
    const device = new SimulatedAndroidDevice({ sdkInt }).connect(registry);
    const bridge = createEsimBridge({ platform: 'android', android: device, registry, setupTimeoutMs: 5000 });

    // 3. Capability
    console.log('\n📡 Checking eSIM capability...');
    const capability = await bridge.getEsimCapability();
    console.log(`   ${capability.isSupported ? '✅' : '❌'} ${capability.reason}`);
    if (capability.firmwareVersion) console.log(`   Firmware: ${capability.firmwareVersion}`);

    // 4. Installed plans
    const plans = await bridge.getActivePlans();
    console.log(`\n📋 Active plans: ${plans.length}`);

    // 5. Install
    console.log(`\n🚀 Installing ${activationCode}...`);
    const outcome = await bridge.openEsimSetup(activationCode);
    console.log(`   Outcome: ${outcome}`);
    console.log(`   Downloads submitted: ${device.downloads.length}, clipboard entries: ${device.clipboard.length}`);
}

main().catch((error: unknown) => {
    console.error('❌ Example failed:', error);
    process.exit(1);
});
