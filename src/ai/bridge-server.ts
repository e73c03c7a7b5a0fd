/**
 * WebSocket Bridge Server — RPC interface for out-of-process agents.
 *
 * Accepts JSON messages over WebSocket: reset, step, score, close.
 * Each connection gets its own BridgeSession (and so its own episode).
 * Binds to localhost only (no LAN exposure).
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { BridgeSession } from './bridge-session';

export function startBridgeServer(port = 9876) {
  const wss = new WebSocketServer({
    port,
    host: '127.0.0.1',
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);

    const session = new BridgeSession();

    ws.on('message', (data: RawData) => {
      const response = session.handleText(data.toString());
      if (response.type === 'error') {
        console.error(`[bridge] ${response.error}: ${response.message}`);
      }
      ws.send(JSON.stringify(response));
    });

    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
    });
  });

  function shutdown() {
    console.log('[bridge] shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    });
    wss.close(() => {
      console.log('[bridge] closed');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  wss.on('listening', () => {
    console.log(`[bridge] listening on ws://127.0.0.1:${port}`);
  });

  return { wss, shutdown };
}
