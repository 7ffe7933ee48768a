/**
 * Test fixtures for @flowrelay/directory tests: an in-process stand-in of the
 * remote process engine, and token helpers.
 */

import express, { type Response } from 'express';
import type { Server } from 'node:http';
import { UnsecuredJWT } from 'jose';
import { Routes, type RouteName } from '../src/routes';

export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  authorization?: string;
  contentType?: string;
  body: unknown;
}

export interface CannedResponse {
  status: number;
  body?: unknown;
  /** Hold the response back this long */
  delayMs?: number;
}

/** Access token expiring `offsetSeconds` from now. */
export function tokenExpiringIn(offsetSeconds: number): string {
  return new UnsecuredJWT({ sub: 'user-1' })
    .setExpirationTime(Math.floor(Date.now() / 1000) + offsetSeconds)
    .encode();
}

export const ACCOUNT_PROCESSES = [
  { id: 'inst-1', action: 'KYC_REVIEW', name: 'kyc', status: 'active', metadata: { step: 1 } },
  { id: 'inst-2', action: 'LOAN_APPLICATION', metadata: {} },
];

/**
 * Express app implementing the engine's routes. Responses can be overridden
 * per route; every request is recorded.
 */
export class FakeEngine {
  readonly requests: RecordedRequest[] = [];
  private readonly overrides = new Map<RouteName, CannedResponse>();
  private server: Server | undefined;

  /** Override the response of one route */
  respond(route: RouteName, response: CannedResponse): void {
    this.overrides.set(route, response);
  }

  async start(): Promise<string> {
    const app = express();
    app.use(express.json());

    app.use((req, _res, next) => {
      const url = new URL(req.originalUrl, 'http://localhost');
      this.requests.push({
        method: req.method,
        path: url.pathname,
        query: Object.fromEntries(url.searchParams),
        authorization: req.get('authorization'),
        contentType: req.get('content-type'),
        body: req.body,
      });
      next();
    });

    app.get(Routes.ContextProcesses, (req, res) => {
      this.reply('ContextProcesses', res, { context: req.params.contextName, processes: ACCOUNT_PROCESSES });
    });

    app.post(Routes.StartOrResumeContextProcess, (req, res) => {
      this.reply('StartOrResumeContextProcess', res, {
        id: 'inst-3',
        action: 'ACCOUNT_OPENING',
        name: req.params.processName,
        metadata: { received: req.body },
      });
    });

    app.post(Routes.ResumeProcess, (req, res) => {
      this.reply('ResumeProcess', res, { id: req.params.instanceId, action: 'DOCUMENT_UPLOAD' });
    });

    app.post(Routes.ContinueTransition, (req, res) => {
      this.reply('ContinueTransition', res, {
        id: req.params.processId,
        action: 'NEXT_SCREEN',
        metadata: { transitionId: req.params.transitionId },
      });
    });

    const server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Fake engine is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  }

  private reply(route: RouteName, res: Response, fallback: unknown): void {
    const canned = this.overrides.get(route) ?? { status: 200, body: fallback };
    const send = () => {
      if (canned.body === undefined) {
        res.status(canned.status).end();
      } else if (typeof canned.body === 'string') {
        res.status(canned.status).type('application/json').send(canned.body);
      } else {
        res.status(canned.status).json(canned.body);
      }
    };
    if (canned.delayMs) {
      setTimeout(send, canned.delayMs);
    } else {
      send();
    }
  }
}
