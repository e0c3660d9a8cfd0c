import type { Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import type { PendingInterrupt, ReviewDecision } from '../contracts/index.js';
import { moduleLogger } from '../logging/logger.js';

const log = moduleLogger('reviewer_feed');

export interface InterruptResolvedEvent {
  conversation_id: string;
  interrupt_id: string;
  decision: ReviewDecision;
}

export interface InterruptNotifier {
  interruptRaised(interrupt: PendingInterrupt): void;
  interruptResolved(event: InterruptResolvedEvent): void;
}

export const silentNotifier: InterruptNotifier = {
  interruptRaised() {},
  interruptResolved() {},
};

/**
 * Pushes interrupt activity to connected reviewers over WebSocket.
 */
export class ReviewerFeed implements InterruptNotifier {
  private readonly wss: WebSocketServer;

  constructor(server: Server, private readonly sha = 'unknown') {
    this.wss = new WebSocketServer({ server, path: '/feed' });
    this.wss.on('connection', (ws) => {
      ws.send(JSON.stringify({ type: 'welcome', service: 'orchestrator', sha: this.sha }));
    });
  }

  interruptRaised(interrupt: PendingInterrupt): void {
    this.broadcast({ type: 'interrupt_raised', interrupt });
  }

  interruptResolved(event: InterruptResolvedEvent): void {
    this.broadcast({ type: 'interrupt_resolved', ...event });
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private broadcast(frame: Record<string, unknown>): void {
    const payload = JSON.stringify(frame);
    let delivered = 0;
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
        delivered += 1;
      }
    }
    log.debug({ msg: 'feed_broadcast', type: frame.type, clients: delivered });
  }
}
