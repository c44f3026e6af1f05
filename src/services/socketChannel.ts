import type { Socket } from 'socket.io';
import { ChannelClosedError } from '../utils/appError';
import type { Channel } from './connectionRegistry';
import type { TransportValue } from './serializer';

/** Event name carrying every envelope in both directions */
export const MESSAGE_EVENT = 'message';

/**
 * Channel over a socket.io socket.
 */
export class SocketChannel implements Channel {
  constructor(private readonly socket: Socket) {}

  get id(): string {
    return this.socket.id;
  }

  send(payload: TransportValue): void {
    if (!this.socket.connected) {
      throw new ChannelClosedError(this.socket.id);
    }
    this.socket.emit(MESSAGE_EVENT, payload);
  }

  close(reason?: string): void {
    if (!this.socket.connected) return;
    if (reason) {
      this.socket.emit('server:disconnect', { reason, timestamp: new Date().toISOString() });
    }
    this.socket.disconnect(true);
  }
}
