export { EsimBridge, BridgeOptions, UnsupportedHostBridge, createEsimBridge } from './application/esim_bridge';
export { AndroidEsimBridge, AndroidBridgeOptions } from './application/android_bridge';
export { IosEsimBridge } from './application/ios_bridge';
export { DownloadCallbackHandler, parseDownloadCallback } from './application/download_callback_handler';
export { DeviceAgentClient } from './api/device_agent_client';
export { CallbackRegistry, DispatchResult } from './domain/callback_registry';
export { CapabilityTier, Feature, classifyTier, supportsFeature, parseOsVersion } from './domain/capability_tier';
export { ActivationCode, DownloadableSubscription, parseActivationCode, forActivationCode } from './domain/activation_code';
export * from './domain/errors';
export * from './domain/gateways';
export * from './domain/models';
export { normalizeSetupOutcome, toOpenedFlag } from './domain/outcome';
export { SimulatedAndroidDevice } from './infrastructure/simulated_android_device';
export { SimulatedIosDevice } from './infrastructure/simulated_ios_device';
export { BridgeConfig, loadBridgeConfig } from './config';
