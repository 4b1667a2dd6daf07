/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import http from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';
import { OrchestratorEventBus } from './bus.js';
import { startEventBusGateway, gatewayPort } from './wsGateway.js';
import { AgentType, type OrchestratorEvent } from './types.js';

function connect(port: number): Promise<{ ws: WebSocket; received: string[] }> {
  const ws = new WebSocket(`ws://localhost:${port}`);
  const received: string[] = [];
  ws.on('message', (data) => received.push(data.toString()));
  return new Promise((resolve) => ws.on('open', () => resolve({ ws, received })));
}

const settle = () => new Promise((resolve) => setTimeout(resolve, 100));

describe('WebSocket Gateway', () => {
  let bus: OrchestratorEventBus;
  let gateway: WebSocketServer;
  let port: number;

  beforeEach(async () => {
    bus = new OrchestratorEventBus();
    gateway = startEventBusGateway(bus, 0); // random port

    await new Promise<void>((resolve) => {
      gateway.on('listening', () => {
        port = gatewayPort(gateway) ?? 0;
        resolve();
      });
    });
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => {
      gateway.close(() => resolve());
    });
  });

  it('should broadcast log events to connected clients', async () => {
    const { ws, received } = await connect(port);

    const logEvent: OrchestratorEvent = { ts: 1700000000000, type: 'log', payload: 'planner started' };
    bus.publish(logEvent);
    await settle();

    expect(received).toHaveLength(1);
    expect(received[0].endsWith('\n')).toBe(true);
    expect(JSON.parse(received[0].trim())).toEqual(logEvent);
    ws.close();
  });

  it('should broadcast loop transitions and warnings', async () => {
    const { ws, received } = await connect(port);

    const transition: OrchestratorEvent = {
      ts: 1700000000001,
      type: 'loop-transition',
      payload: { from: 'CRITIQUING', to: 'REVISING', event: 'revise', iteration: 1 },
    };
    const warning: OrchestratorEvent = {
      ts: 1700000000002,
      type: 'warning',
      payload: { agent: AgentType.PLANNER, message: 'model unavailable, using rule-based plan' },
    };
    bus.publish(transition);
    bus.publish(warning);
    await settle();

    expect(received.map((line) => JSON.parse(line.trim()))).toEqual([transition, warning]);
    ws.close();
  });

  it('should handle multiple simultaneous clients', async () => {
    const [first, second] = await Promise.all([connect(port), connect(port)]);

    const event: OrchestratorEvent = {
      ts: 1700000000003,
      type: 'agent-start',
      payload: { id: AgentType.EXECUTOR },
    };
    bus.publish(event);
    await settle();

    expect(first.received).toHaveLength(1);
    expect(second.received).toHaveLength(1);
    expect(JSON.parse(first.received[0].trim())).toEqual(event);
    expect(JSON.parse(second.received[0].trim())).toEqual(event);

    first.ws.close();
    second.ws.close();
  });

  it('should clean up subscriptions when client disconnects', async () => {
    const { ws } = await connect(port);
    expect(bus.listenerCount()).toBe(7);

    const closed = new Promise<void>((resolve) => ws.on('close', () => resolve()));
    ws.close();
    await closed;
    await settle();

    expect(bus.listenerCount()).toBe(0);
    expect(() =>
      bus.publish({ ts: 1700000000004, type: 'log', payload: 'nobody is listening' }),
    ).not.toThrow();
  });
});

describe('WebSocket Gateway on a busy port', () => {
  let blocker: http.Server;

  beforeEach(async () => {
    vi.stubEnv('DUELPLAN_QUIET', '');
    blocker = http.createServer();
    await new Promise<void>((resolve) => blocker.listen(0, () => resolve()));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await new Promise<void>((resolve) => blocker.close(() => resolve()));
  });

  it('warns instead of crashing when the port is taken', async () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => {});
    const address = blocker.address();
    const taken = typeof address === 'object' && address ? address.port : 0;

    const gateway = startEventBusGateway(new OrchestratorEventBus(), taken);
    const error = await new Promise<NodeJS.ErrnoException>((resolve) => gateway.once('error', resolve));

    expect(error.code).toBe('EADDRINUSE');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain(`[ORCHESTRATOR] warning: event gateway error: ${error.message}`);

    await new Promise<void>((resolve) => gateway.close(() => resolve()));
  });
});
