import { ProxyAgent, type Dispatcher } from 'undici';
import type { ProxyConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Proxy URL for the configuration, or an empty string when disabled.
 */
export function getProxyUrl(config: ProxyConfig): string {
    if (!config.enabled) return '';
    return `${config.type}://${config.host}:${config.port}`;
}

/**
 * Build the undici dispatcher that tunnels requests through the configured proxy.
 * Returns undefined when no proxy is enabled, so fetch uses its global dispatcher.
 */
export function createProxyDispatcher(config: ProxyConfig): Dispatcher | undefined {
    const url = getProxyUrl(config);
    if (!url) return undefined;

    getLogger().info({ proxy: url }, 'Routing requests through proxy');
    return new ProxyAgent(url);
}
