/**
 * Entry point for the agent bridge: `npm run bridge`.
 *
 * Env: BRIDGE_PORT (default 9876). Each WebSocket connection plays its own
 * episodes; see BridgeSession for the message set.
 */

import { startBridgeServer } from './bridge-server';

const DEFAULT_PORT = 9876;

const rawPort = process.env.BRIDGE_PORT;
const port = rawPort === undefined ? DEFAULT_PORT : Number(rawPort);
if (!Number.isInteger(port) || port < 1 || port > 65535) {
  console.error(`[bridge] BRIDGE_PORT must be an integer from 1 to 65535, got "${rawPort}"`);
  process.exit(1);
}

startBridgeServer(port);
