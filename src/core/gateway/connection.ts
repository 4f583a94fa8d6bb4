import WebSocket from 'ws';
import { ConnectionLostError } from '../errors.js';
import type { StructuredLogger } from '../kernel/contracts.js';
import type { OutboundFrame } from './protocol.js';

/**
 * Serialize and send one frame on `socket`.
 *
 * @throws ConnectionLostError when the socket is not open or the write fails.
 */
export function sendFrame(socket: WebSocket, frame: OutboundFrame): Promise<void> {
  if (socket.readyState !== WebSocket.OPEN) {
    return Promise.reject(new ConnectionLostError());
  }
  return new Promise<void>((resolve, reject) => {
    socket.send(JSON.stringify(frame), (error) => {
      if (error) {
        reject(new ConnectionLostError(error.message));
        return;
      }
      resolve();
    });
  });
}

/** Decode a `ws` message payload as UTF-8 text. */
export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Holds the single live operator socket. A new connection replaces the
 * previous one; a close only clears the handle if it is still current.
 */
export class ConnectionHandle {
  private socket: WebSocket | null = null;

  constructor(private readonly logger: StructuredLogger) {}

  get current(): WebSocket | null {
    return this.socket;
  }

  get connected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  attach(socket: WebSocket): void {
    if (this.socket && this.socket !== socket) {
      this.logger.info('Replacing operator connection');
    }
    this.socket = socket;
  }

  /** Returns true when `socket` was the current connection and got cleared. */
  detach(socket: WebSocket): boolean {
    if (this.socket !== socket) {
      return false;
    }
    this.socket = null;
    return true;
  }

  /**
   * Send one frame on the current socket. Frames are written in call order.
   *
   * @throws ConnectionLostError when no open connection exists or the write fails.
   */
  async send(frame: OutboundFrame): Promise<void> {
    if (!this.socket) {
      throw new ConnectionLostError();
    }
    await sendFrame(this.socket, frame);
  }

  /** Close the current socket, if any, and forget it. */
  close(code = 1000, reason = 'server closing'): void {
    const socket = this.socket;
    this.socket = null;
    if (socket && socket.readyState !== WebSocket.CLOSED) {
      socket.close(code, reason);
    }
  }
}
