/**
 * In-memory connection handle for registry and gateway tests
 */

import {
  ConnectionHandle,
  ConnectionReadyState,
} from '../lib/interfaces/connection.interface';

export class MockConnection implements ConnectionHandle {
  readyState: number = ConnectionReadyState.OPEN;
  readonly frames: string[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];

  /** Fail every write after this many successful ones (Infinity = never) */
  failAfter = Infinity;
  throwOnClose = false;

  send(data: string, callback?: (error?: Error) => void): void {
    if (this.frames.length >= this.failAfter) {
      callback?.(new Error('socket hang up'));
      return;
    }
    this.frames.push(data);
    callback?.();
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    if (this.throwOnClose) {
      throw new Error('close failed');
    }
    this.readyState = ConnectionReadyState.CLOSED;
  }

  /** Parsed frames, in write order */
  get envelopes(): Array<Record<string, unknown>> {
    return this.frames.map((frame): Record<string, unknown> => JSON.parse(frame));
  }

  get types(): unknown[] {
    return this.envelopes.map((envelope) => envelope['type']);
  }

  static failing(): MockConnection {
    const connection = new MockConnection();
    connection.failAfter = 0;
    return connection;
  }
}
