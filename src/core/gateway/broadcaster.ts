/**
 * @module gateway/broadcaster
 *
 * Fan-out of typed envelopes to the subscribers of three independent channels.
 * The broadcaster holds no domain state: an event published while a
 * subscriber is away is gone for that subscriber, and a send that throws or a
 * socket that is no longer open drops the event for that subscriber only.
 */
import type { StructuredLogger } from '../kernel/contracts.js';
import { errorMessage } from '../../errors.js';
import { CHANNELS, type ChannelEnvelope, type ChannelName, type EnvelopeType } from './protocol.js';

export interface ChannelSubscriber {
  id: string;
  isOpen(): boolean;
  send(data: string): void;
}

export interface PublishReport {
  delivered: number;
  dropped: number;
}

export class EventBroadcaster {
  private readonly channels = new Map<ChannelName, Map<string, ChannelSubscriber>>(
    CHANNELS.map((channel) => [channel, new Map<string, ChannelSubscriber>()])
  );
  private readonly taps = new Set<(channel: ChannelName, envelope: ChannelEnvelope) => void>();

  constructor(private readonly logger?: StructuredLogger) {}

  subscribe(channel: ChannelName, subscriber: ChannelSubscriber): () => void {
    const members = this.members(channel);
    members.set(subscriber.id, subscriber);
    return () => {
      if (members.get(subscriber.id) === subscriber) {
        members.delete(subscriber.id);
      }
    };
  }

  publish<T>(channel: ChannelName, type: EnvelopeType, payload: T): PublishReport {
    const envelope: ChannelEnvelope<T> = { type, payload, at: new Date().toISOString() };
    for (const tap of this.taps) {
      try {
        tap(channel, envelope);
      } catch (error) {
        // Taps never affect delivery.
        this.logger?.warn('Broadcast tap failed', { channel, type, reason: errorMessage(error) });
      }
    }

    const members = this.members(channel);
    if (members.size === 0) {
      return { delivered: 0, dropped: 0 };
    }

    const frame = JSON.stringify(envelope);
    let delivered = 0;
    let dropped = 0;
    for (const subscriber of [...members.values()]) {
      if (!subscriber.isOpen()) {
        members.delete(subscriber.id);
        dropped++;
        continue;
      }
      try {
        subscriber.send(frame);
        delivered++;
      } catch (error) {
        dropped++;
        this.logger?.debug('Dropped event for subscriber', {
          channel,
          type,
          subscriber: subscriber.id,
          reason: errorMessage(error)
        });
      }
    }
    return { delivered, dropped };
  }

  /** In-process observer of every published envelope, connected or not. */
  tap(listener: (channel: ChannelName, envelope: ChannelEnvelope) => void): () => void {
    this.taps.add(listener);
    return () => this.taps.delete(listener);
  }

  subscriberCount(channel?: ChannelName): number {
    if (channel) {
      return this.members(channel).size;
    }
    let total = 0;
    for (const members of this.channels.values()) total += members.size;
    return total;
  }

  clear(): void {
    for (const members of this.channels.values()) members.clear();
  }

  private members(channel: ChannelName): Map<string, ChannelSubscriber> {
    let members = this.channels.get(channel);
    if (!members) {
      members = new Map();
      this.channels.set(channel, members);
    }
    return members;
  }
}
