/**
 * Connection registry interfaces
 * A handle is any duplex transport with ws-compatible send/close semantics
 */

export const ConnectionReadyState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;

export interface ConnectionHandle {
  readonly readyState: number;
  send(data: string, callback?: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export type ConnectionState = 'absent' | 'live' | 'idle';

export interface ConnectionMetadata {
  connectedAt: Date;
  lastActivity: Date;
  disconnectedAt?: Date;
  messagesSent: number;
  messagesReceived: number;
}

export interface ConnectionRecord {
  userId: string;
  handle?: ConnectionHandle; // Present only while connected
  metadata: ConnectionMetadata;
}

export interface SendOptions {
  /** Queue the envelope when the user has no live connection (default true) */
  queueIfOffline?: boolean;
}

export interface ConnectionStats {
  totalConnections: number;
  activeConnections: number;
  messagesSent: number;
  messagesReceived: number;
  queuedMessages: number;
  activeConversations: number;
}

export interface UserConnectionInfo {
  userId: string;
  state: ConnectionState;
  connected: boolean;
  metadata: ConnectionMetadata | null;
  queuedMessages: number;
  activeConversations: string[];
}
