import * as dotenv from 'dotenv';
import { ConfigError } from './domain/errors';
import { HostPlatform } from './domain/models';

export type DeviceMode = 'SIMULATED' | 'AGENT';

export interface BridgeConfig {
    port: number;
    platform: HostPlatform;
    deviceMode: DeviceMode;
    agent?: {
        url: string;
        token: string;
    };
    publicUrl: string;
    setupTimeoutMs?: number;
    simulatedOsVersion?: string;
}

const HOST_PLATFORMS: readonly HostPlatform[] = ['android', 'ios', 'web', 'desktop'];
const DEVICE_MODES: readonly DeviceMode[] = ['SIMULATED', 'AGENT'];

function isHostPlatform(value: string): value is HostPlatform {
    return HOST_PLATFORMS.some(p => p === value);
}

function isDeviceMode(value: string): value is DeviceMode {
    return DEVICE_MODES.some(m => m === value);
}

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Loads `.env` into process.env. Values already in the environment win.
 */
export function loadEnvFile(path?: string): void {
    dotenv.config(path ? { path } : undefined);
}

/**
 * Validates the bridge configuration. Collects every problem before failing.
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
    const problems: string[] = [];

    const portStr = env.BRIDGE_PORT;
    const port = portStr ? parseInt(portStr, 10) : NaN;
    if (!portStr) {
        problems.push('BRIDGE_PORT is missing');
    } else if (isNaN(port) || String(port) !== portStr.trim() || port < 1024 || port > 65535) {
        problems.push(`BRIDGE_PORT must be integer between 1024-65535. Found: '${portStr}'`);
    }

    const platformStr = (env.BRIDGE_PLATFORM ?? '').trim().toLowerCase();
    let platform: HostPlatform = 'web';
    if (!platformStr) {
        problems.push('BRIDGE_PLATFORM is missing');
    } else if (!isHostPlatform(platformStr)) {
        problems.push(`BRIDGE_PLATFORM must be one of ${HOST_PLATFORMS.join(', ')}. Found: '${platformStr}'`);
    } else {
        platform = platformStr;
    }

    const modeStr = (env.BRIDGE_DEVICE_MODE ?? 'SIMULATED').trim().toUpperCase();
    let deviceMode: DeviceMode = 'SIMULATED';
    if (!isDeviceMode(modeStr)) {
        problems.push(`BRIDGE_DEVICE_MODE must be SIMULATED or AGENT. Found: '${modeStr}'`);
    } else {
        deviceMode = modeStr;
    }

    let agent: BridgeConfig['agent'];
    if (deviceMode === 'AGENT') {
        const url = env.DEVICE_AGENT_URL;
        const token = env.DEVICE_AGENT_TOKEN;
        if (!url) problems.push('DEVICE_AGENT_URL is required in AGENT mode');
        else if (!isHttpUrl(url)) problems.push(`DEVICE_AGENT_URL is not an http(s) URL: '${url}'`);
        if (!token) problems.push('DEVICE_AGENT_TOKEN is required in AGENT mode');
        if (url && token) agent = { url, token };
    }

    const publicUrl = env.BRIDGE_PUBLIC_URL || `http://localhost:${isNaN(port) ? 3000 : port}`;
    if (!isHttpUrl(publicUrl)) {
        problems.push(`BRIDGE_PUBLIC_URL is not an http(s) URL: '${publicUrl}'`);
    }

    let setupTimeoutMs: number | undefined;
    const timeoutStr = env.BRIDGE_SETUP_TIMEOUT_MS;
    if (timeoutStr) {
        const parsed = parseInt(timeoutStr, 10);
        if (isNaN(parsed) || parsed <= 0 || String(parsed) !== timeoutStr.trim()) {
            problems.push(`BRIDGE_SETUP_TIMEOUT_MS must be a positive integer. Found: '${timeoutStr}'`);
        } else {
            setupTimeoutMs = parsed;
        }
    }

    if (problems.length > 0) {
        throw new ConfigError(problems);
    }

    return {
        port,
        platform,
        deviceMode,
        ...(agent ? { agent } : {}),
        publicUrl,
        ...(setupTimeoutMs !== undefined ? { setupTimeoutMs } : {}),
        ...(env.SIMULATED_OS_VERSION ? { simulatedOsVersion: env.SIMULATED_OS_VERSION } : {}),
    };
}
