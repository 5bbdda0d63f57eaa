/**
 * @module gateway/channel-client
 *
 * Reconnecting observer for one streaming channel. Push delivery is
 * at-most-once, so after every (re)connect the client first runs the
 * caller's `resync` (a pull of authoritative state) and only then starts
 * handing envelopes to `onEvent`. Envelopes that arrive while the pull is in
 * flight are dropped; the pull already covers them.
 */
import { WebSocket } from 'ws';
import type { StructuredLogger } from '../kernel/contracts.js';
import { backoffDelay } from '../utils/timing.js';
import { errorMessage } from '../../errors.js';
import {
  isControlMessage,
  parseServerMessage,
  type ChannelEnvelope,
  type ChannelName,
  type ControlMessage
} from './protocol.js';

export type ChannelClientState = 'idle' | 'connecting' | 'resyncing' | 'live' | 'closed';

export interface ChannelClientOptions {
  /** Gateway base URL, e.g. `ws://127.0.0.1:7700`. */
  baseUrl: string;
  channel: ChannelName;
  token?: string;
  resync: () => Promise<void>;
  onEvent: (envelope: ChannelEnvelope) => void;
  onControl?: (message: ControlMessage) => void;
  onStateChange?: (state: ChannelClientState) => void;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Proportional spread applied to each delay. */
  jitter?: number;
  random?: () => number;
  logger?: StructuredLogger;
}

export class ChannelClient {
  private socket: WebSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private attempt = 0;
  private current: ChannelClientState = 'idle';
  private droppedDuringResync = 0;

  constructor(private readonly options: ChannelClientOptions) {}

  get state(): ChannelClientState {
    return this.current;
  }

  /** Envelopes discarded because they arrived before resync finished. */
  get dropped(): number {
    return this.droppedDuringResync;
  }

  connect(): void {
    if (this.current === 'closed') return;
    this.open();
  }

  /** Delay before reconnect attempt `attempt` (1-based). */
  nextDelay(attempt: number): number {
    return backoffDelay(
      attempt,
      this.options.initialDelayMs ?? 500,
      this.options.maxDelayMs ?? 10_000,
      this.options.jitter ?? 0.2,
      this.options.random
    );
  }

  send(message: unknown): boolean {
    if (!this.socket || this.socket.readyState !== WebSocket.OPEN) return false;
    this.socket.send(JSON.stringify(message));
    return true;
  }

  close(): void {
    this.setState('closed');
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const socket = this.socket;
    this.socket = null;
    socket?.removeAllListeners();
    socket?.on('error', () => undefined);
    socket?.terminate();
  }

  private open(): void {
    const url = new URL(`/ws/${this.options.channel}`, this.options.baseUrl);
    if (this.options.token) {
      url.searchParams.set('token', this.options.token);
    }

    this.setState('connecting');
    const socket = new WebSocket(url);
    this.socket = socket;

    socket.on('open', () => {
      if (this.socket !== socket) return;
      this.attempt = 0;
      this.runResync(socket).catch((error: unknown) => {
        this.options.logger?.warn('Channel resync crashed', { channel: this.options.channel, reason: errorMessage(error) });
      });
    });
    socket.on('message', (raw) => {
      if (this.socket !== socket) return;
      this.handleFrame(String(raw));
    });
    socket.on('error', (error) => {
      this.options.logger?.debug('Channel socket error', { channel: this.options.channel, reason: error.message });
    });
    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.scheduleReconnect();
    });
  }

  private async runResync(socket: WebSocket): Promise<void> {
    this.setState('resyncing');
    try {
      await this.options.resync();
    } catch (error) {
      // Without authoritative state the push stream cannot be trusted; start over.
      this.options.logger?.warn('Channel resync failed', { channel: this.options.channel, reason: errorMessage(error) });
      socket.terminate();
      return;
    }
    if (this.socket === socket && this.current === 'resyncing') {
      this.setState('live');
    }
  }

  private handleFrame(raw: string): void {
    const message = parseServerMessage(raw);
    if (!message) {
      this.options.logger?.debug('Ignoring malformed frame', { channel: this.options.channel });
      return;
    }
    if (isControlMessage(message)) {
      this.options.onControl?.(message);
      return;
    }
    if (this.current !== 'live') {
      this.droppedDuringResync++;
      return;
    }
    this.options.onEvent(message);
  }

  private scheduleReconnect(): void {
    if (this.current === 'closed') return;
    this.attempt += 1;
    const delay = this.nextDelay(this.attempt);
    this.setState('idle');
    this.options.logger?.debug('Channel reconnect scheduled', {
      channel: this.options.channel,
      attempt: this.attempt,
      delayMs: delay,
    });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.current !== 'closed') this.open();
    }, delay);
  }

  private setState(state: ChannelClientState): void {
    if (this.current === state) return;
    this.current = state;
    this.options.onStateChange?.(state);
  }
}
