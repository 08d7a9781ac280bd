import type { AppConfig } from '../config.js';
import { RouterOsApiClient } from './routerosApi.js';
import { RouterOsRestClient } from './routerosRest.js';
import type { GatewayConnectOptions, GatewayConnector } from './types.js';

export function connectOptionsFromConfig(config: AppConfig): GatewayConnectOptions {
  return {
    timeoutMs: config.GATEWAY_TIMEOUT_MS,
    apiPort: config.GATEWAY_API_PORT,
    apiTls: config.GATEWAY_API_TLS,
    restScheme: config.GATEWAY_REST_SCHEME,
    tlsInsecure: config.GATEWAY_TLS_INSECURE
  };
}

/** Picks the transport from the device's login method: `rest` uses HTTP, the rest the binary API. */
export function createGatewayConnector(opts: GatewayConnectOptions): GatewayConnector {
  return async (device) => {
    if (device.method === 'rest') return await RouterOsRestClient.connect(device, opts);
    return await RouterOsApiClient.connect(device, opts);
  };
}
