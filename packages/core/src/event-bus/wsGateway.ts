/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import http from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import type { OrchestratorEventBus } from './bus.js';
import { EVENT_TYPES, type OrchestratorEvent } from './types.js';
import { getErrorMessage } from '../utils/errors.js';
import { duelLog, duelWarn } from '../utils/duelLogger.js';

/**
 * Starts a WebSocket gateway that broadcasts every bus event to connected
 * clients as line-delimited JSON. An external presentation layer can follow
 * a run (plan revisions, critiques, step progress) through it.
 */
export function startEventBusGateway(
  bus: OrchestratorEventBus,
  port: number = 0
): WebSocketServer {
  const server = http.createServer();
  const wss = new WebSocketServer({ server });

  // Active clients and their unsubscribe functions
  const clients = new Map<WebSocket, (() => void)[]>();

  const release = (ws: WebSocket) => {
    const unsubscribes = clients.get(ws);
    if (unsubscribes) {
      unsubscribes.forEach((unsubscribe) => unsubscribe());
      clients.delete(ws);
    }
  };

  wss.on('connection', (ws: WebSocket) => {
    duelLog('ORCHESTRATOR', 'event gateway client connected');

    const send = (event: OrchestratorEvent) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(JSON.stringify(event) + '\n', (error) => {
        if (error) {
          duelLog('ORCHESTRATOR', `event gateway send failed: ${getErrorMessage(error)}`);
        }
      });
    };

    clients.set(ws, EVENT_TYPES.map((type) => bus.subscribe(type, send)));

    ws.on('close', () => {
      duelLog('ORCHESTRATOR', 'event gateway client disconnected');
      release(ws);
    });

    ws.on('error', (error) => {
      duelLog('ORCHESTRATOR', `event gateway client error: ${error.message}`);
      release(ws);
    });
  });

  // the HTTP server's errors (a busy port) are re-emitted here
  wss.on('error', (error) => {
    duelWarn('ORCHESTRATOR', `event gateway error: ${error.message}`);
  });

  wss.on('close', () => {
    for (const ws of [...clients.keys()]) {
      release(ws);
    }
    server.close();
  });

  server.listen(port, () => {
    const address = server.address();
    const boundPort = typeof address === 'object' && address ? address.port : port;
    duelLog('ORCHESTRATOR', `event gateway listening on port ${boundPort}`);
  });

  return wss;
}

/** Port the gateway's HTTP server is bound to, once listening. */
export function gatewayPort(wss: WebSocketServer): number | undefined {
  const address = wss.options.server?.address();
  return typeof address === 'object' && address ? address.port : undefined;
}
