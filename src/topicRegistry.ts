import { decodePayload, encodePayload } from './codec';
import {
  ConnectionRefusedError,
  DuplicateRegistrationError,
  NotRegisteredError,
  SubscriptionFailedError,
  UnroutedMessageError,
} from './errors';
import { MessageQueue } from './messageQueue';
import type { InboundMessage, Payload } from './types';
import { debug, describeError, log, warn } from './logger';

export type TopicHandler = (payload: Payload) => void;

// What the registry needs from a publish/subscribe client. Subscribe and
// unsubscribe reject when the broker refuses the request.
export interface Transport {
  subscribe(topic: string): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
}

/**
 * Maps topics to handlers and moves messages between the transport and the
 * automation loop. Inbound messages are only queued from the transport
 * callback; handlers run when the loop drains the queue.
 */
export class TopicRegistry {
  private handlers: Map<string, TopicHandler> = new Map();

  constructor(private transport: Transport, private inbound: MessageQueue<InboundMessage>) {}

  async register(topic: string, handler: TopicHandler): Promise<void> {
    if (this.handlers.has(topic)) throw new DuplicateRegistrationError(topic);
    // bind first so retained messages delivered with the SUBACK are routable
    this.handlers.set(topic, handler);
    try {
      await this.transport.subscribe(topic);
    } catch (err: unknown) {
      this.handlers.delete(topic);
      throw new SubscriptionFailedError(topic, 'subscribe', describeError(err));
    }
    log('Subscribed to', topic);
  }

  async unregister(topic: string): Promise<TopicHandler> {
    const handler = this.handlers.get(topic);
    if (!handler) throw new NotRegisteredError(topic);
    try {
      await this.transport.unsubscribe(topic);
    } catch (err: unknown) {
      throw new SubscriptionFailedError(topic, 'unsubscribe', describeError(err));
    }
    this.handlers.delete(topic);
    log('Unsubscribed from', topic);
    return handler;
  }

  has(topic: string): boolean {
    return this.handlers.has(topic);
  }

  topics(): string[] {
    return Array.from(this.handlers.keys());
  }

  processInbound(topic: string, payload: Payload): void {
    const handler = this.handlers.get(topic);
    if (!handler) throw new UnroutedMessageError(topic);
    handler(payload);
  }

  processOutbound(topic: string, payload: Payload): void {
    const body = encodePayload(payload);
    log('Message to', topic, 'with payload', body);
    this.transport.publish(topic, body).catch((err: unknown) => warn('Publish to', topic, 'failed', describeError(err)));
  }

  // Broker-side subscriptions may not survive a reconnect, so replay them all
  onConnect(reasonCode: number): void {
    if (reasonCode !== 0) throw new ConnectionRefusedError(reasonCode);
    log('Connected successfully');
    for (const topic of this.handlers.keys()) {
      this.transport.subscribe(topic).catch((err: unknown) => warn('Re-subscription to', topic, 'failed', describeError(err)));
    }
  }

  onMessage(topic: string, raw: Buffer | Uint8Array | string): void {
    if (!this.handlers.has(topic)) throw new UnroutedMessageError(topic);
    const payload = decodePayload(raw);
    if (payload === undefined) {
      debug('Dropping malformed payload from', topic);
      return;
    }
    debug('Message from', topic, 'received');
    this.inbound.push({ topic, payload });
  }
}

export default TopicRegistry;
