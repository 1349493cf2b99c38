import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import {
  AgentType,
  ConnectionLimits,
  ConnectionEstablishedEnvelope,
  EnvelopeType,
  NotificationType,
  OutboundEnvelope,
  SystemNotificationEnvelope,
  TypingIndicatorEnvelope,
} from '@career-agent/shared/types';
import { KeyedMutex, errorMessage, sleep, withTimeout } from '@career-agent/shared/utils';
import {
  ConnectionHandle,
  ConnectionReadyState,
  ConnectionRecord,
  ConnectionState,
  ConnectionStats,
  SendOptions,
  UserConnectionInfo,
} from './interfaces/connection.interface';
import { TransportFailureError } from './errors';

/**
 * ConnectionRegistryService - Duplex Connection Manager
 *
 * - One live handle per user identity (a new connect replaces the old one)
 * - Bounded FIFO outbound queue per user, kept while the user is offline
 * - Queued envelopes are flushed in order on reconnect, after the welcome
 * - send(), broadcast() and the flush are serialized per user, so nothing
 *   sent during a flush can overtake a queued envelope
 * - disconnect() is synchronous and takes no lock; an in-progress flush or
 *   broadcast sees the handle gone before its next write
 */
@Injectable()
export class ConnectionRegistryService implements OnModuleDestroy {
  private readonly logger = new Logger(ConnectionRegistryService.name);
  private readonly records = new Map<string, ConnectionRecord>();
  private readonly queues = new Map<string, OutboundEnvelope[]>();
  private readonly conversations = new Map<string, string[]>();
  private readonly userLocks = new KeyedMutex();
  private readonly stats = {
    totalConnections: 0,
    activeConnections: 0,
    messagesSent: 0,
    messagesReceived: 0,
  };

  private readonly maxQueueSize = ConnectionLimits.MAX_QUEUE_SIZE;
  private readonly flushDelayMs: number;
  private readonly writeTimeoutMs: number;
  private readonly maxIdleMinutes: number;

  constructor(private readonly config: ConfigService) {
    this.flushDelayMs = this.config.get<number>(
      'connections.flushDelayMs',
      ConnectionLimits.QUEUE_FLUSH_DELAY
    );
    this.writeTimeoutMs = this.config.get<number>(
      'connections.writeTimeoutMs',
      ConnectionLimits.WRITE_TIMEOUT
    );
    this.maxIdleMinutes = this.config.get<number>(
      'connections.maxIdleMinutes',
      ConnectionLimits.MAX_IDLE_MINUTES
    );
  }

  /**
   * NestJS lifecycle hook - close every live connection on shutdown
   */
  onModuleDestroy(): void {
    let closed = 0;
    for (const record of this.records.values()) {
      const handle = record.handle;
      if (!handle) continue;

      try {
        handle.close(1001, 'Server shutting down');
      } catch (error) {
        this.logger.error(`[${record.userId}] Error closing connection:`, error);
      }
      this.disconnect(record.userId, handle);
      closed++;
    }

    this.logger.log(`Shutdown complete - closed ${closed} connections`);
  }

  // ========================================================================
  // Connection Lifecycle
  // ========================================================================

  /**
   * Register a live handle for a user, send the welcome, then flush the queue.
   * The welcome is written before the handle is registered: a handle that
   * fails it is never registered, any previous live handle stays in place,
   * and the error is re-thrown.
   */
  async connect(handle: ConnectionHandle, userId: string): Promise<void> {
    await this.userLocks.runExclusive(userId, async () => {
      let record = this.records.get(userId);

      if (!record) {
        const now = new Date();
        record = {
          userId,
          metadata: {
            connectedAt: now,
            lastActivity: now,
            messagesSent: 0,
            messagesReceived: 0,
          },
        };
        this.records.set(userId, record);
      }

      try {
        await this.writeFrame(userId, handle, this.buildWelcome(userId));
      } catch (error) {
        this.logger.error(`[${userId}] Connection handshake failed: ${errorMessage(error)}`);
        if (!record.handle) {
          record.metadata.disconnectedAt = new Date();
        }
        throw error;
      }

      const previous = record.handle;
      if (previous && previous !== handle) {
        this.logger.warn(`[${userId}] Replacing existing connection`);
        this.closeQuietly(userId, previous, 4000, 'Replaced by a new connection');
      } else if (!previous) {
        this.stats.activeConnections += 1;
      }

      record.handle = handle;
      record.metadata.connectedAt = new Date();
      record.metadata.disconnectedAt = undefined;
      this.touch(record);
      this.stats.totalConnections += 1;

      this.logger.log(`[${userId}] Connected (active: ${this.stats.activeConnections})`);

      await this.flushQueue(userId, handle);
    });
  }

  /**
   * Drop the live handle. Metadata and the outbound queue are kept.
   * When a handle is given, only that handle is dropped (a stale close
   * event must not detach a newer connection).
   */
  disconnect(userId: string, handle?: ConnectionHandle): boolean {
    const record = this.records.get(userId);
    if (!record?.handle) {
      return false;
    }

    if (handle && record.handle !== handle) {
      this.logger.debug(`[${userId}] Ignoring disconnect for a replaced connection`);
      return false;
    }

    record.handle = undefined;
    record.metadata.disconnectedAt = new Date();
    this.stats.activeConnections -= 1;

    this.logger.log(`[${userId}] Disconnected (active: ${this.stats.activeConnections})`);
    return true;
  }

  // ========================================================================
  // Delivery
  // ========================================================================

  /**
   * Deliver an envelope to the user's live connection, or queue it.
   * Returns true only when the envelope was written to a live connection.
   */
  async send(
    userId: string,
    envelope: OutboundEnvelope,
    options: SendOptions = {}
  ): Promise<boolean> {
    const queueIfOffline = options.queueIfOffline ?? true;
    return this.userLocks.runExclusive(userId, () =>
      this.deliver(userId, envelope, queueIfOffline)
    );
  }

  async sendTypingIndicator(
    userId: string,
    agentType: string,
    isTyping: boolean
  ): Promise<boolean> {
    const envelope: TypingIndicatorEnvelope = {
      type: EnvelopeType.TYPING_INDICATOR,
      agent: agentType,
      isTyping,
    };
    return this.send(userId, envelope, { queueIfOffline: false });
  }

  /**
   * Write to every live connection not excluded. Users are written to
   * concurrently, each under its own lock, so a broadcast never lands inside
   * a reconnect flush. Identities whose write failed are disconnected.
   * Returns the number of successful deliveries.
   */
  async broadcast(
    envelope: OutboundEnvelope,
    exclude: Iterable<string> = []
  ): Promise<number> {
    const excluded = new Set(exclude);
    const frame: OutboundEnvelope = {
      ...envelope,
      broadcast: true,
      timestamp: new Date().toISOString(),
    };

    const targets: ConnectionRecord[] = [];
    for (const record of this.records.values()) {
      if (record.handle && !excluded.has(record.userId)) {
        targets.push(record);
      }
    }

    const outcomes = await Promise.all(
      targets.map((record) =>
        this.userLocks.runExclusive(record.userId, () => this.writeBroadcast(record, frame))
      )
    );

    const sentCount = outcomes.filter((outcome) => outcome === 'sent').length;
    const failedCount = outcomes.filter((outcome) => outcome === 'failed').length;
    this.logger.log(`Broadcast sent to ${sentCount} users, ${failedCount} failed`);
    return sentCount;
  }

  // ========================================================================
  // Idle Cleanup
  // ========================================================================

  /**
   * Close and disconnect live connections idle for longer than the threshold.
   * Close failures are logged and ignored; the disconnect always happens.
   */
  cleanupIdle(maxIdleMinutes: number = this.maxIdleMinutes): number {
    const cutoff = Date.now() - maxIdleMinutes * 60 * 1000;
    const idle: Array<{ userId: string; handle: ConnectionHandle }> = [];

    for (const record of this.records.values()) {
      if (record.handle && record.metadata.lastActivity.getTime() < cutoff) {
        idle.push({ userId: record.userId, handle: record.handle });
      }
    }

    for (const { userId, handle } of idle) {
      this.closeQuietly(userId, handle, 1000, 'Idle timeout');
      this.disconnect(userId, handle);
    }

    if (idle.length > 0) {
      this.logger.log(`Cleaned up ${idle.length} inactive connections`);
    }
    return idle.length;
  }

  @Cron(CronExpression.EVERY_5_MINUTES)
  handleIdleSweep(): void {
    this.cleanupIdle(this.maxIdleMinutes);
  }

  // ========================================================================
  // Bookkeeping
  // ========================================================================

  recordInbound(userId: string): void {
    const record = this.records.get(userId);
    if (!record) return;

    record.metadata.messagesReceived += 1;
    this.stats.messagesReceived += 1;
    this.touch(record);
  }

  trackConversation(userId: string, conversationId: string): void {
    const active = this.conversations.get(userId) ?? [];
    if (!active.includes(conversationId)) {
      active.push(conversationId);
    }
    this.conversations.set(userId, active);
  }

  untrackConversation(userId: string, conversationId: string): void {
    const active = this.conversations.get(userId);
    if (!active) return;

    const remaining = active.filter((id) => id !== conversationId);
    if (remaining.length === 0) {
      this.conversations.delete(userId);
    } else {
      this.conversations.set(userId, remaining);
    }
  }

  // ========================================================================
  // Queries
  // ========================================================================

  getConnectionState(userId: string): ConnectionState {
    const record = this.records.get(userId);
    if (!record) return 'absent';
    return record.handle ? 'live' : 'idle';
  }

  isConnected(userId: string): boolean {
    return this.getConnectionState(userId) === 'live';
  }

  queueLength(userId: string): number {
    return this.queues.get(userId)?.length ?? 0;
  }

  getQueuedEnvelopes(userId: string): OutboundEnvelope[] {
    return [...(this.queues.get(userId) ?? [])];
  }

  getStats(): ConnectionStats {
    let queuedMessages = 0;
    for (const queue of this.queues.values()) {
      queuedMessages += queue.length;
    }

    const activeConversations = new Set<string>();
    for (const ids of this.conversations.values()) {
      ids.forEach((id) => activeConversations.add(id));
    }

    return {
      ...this.stats,
      queuedMessages,
      activeConversations: activeConversations.size,
    };
  }

  getUserConnectionInfo(userId: string): UserConnectionInfo {
    const record = this.records.get(userId);
    return {
      userId,
      state: this.getConnectionState(userId),
      connected: Boolean(record?.handle),
      metadata: record ? { ...record.metadata } : null,
      queuedMessages: this.queueLength(userId),
      activeConversations: [...(this.conversations.get(userId) ?? [])],
    };
  }

  // ========================================================================
  // Private Helpers
  // ========================================================================

  /**
   * Unlocked delivery; callers must hold the user's lock
   */
  private async deliver(
    userId: string,
    envelope: OutboundEnvelope,
    queueIfOffline: boolean
  ): Promise<boolean> {
    const record = this.records.get(userId);
    const handle = record?.handle;

    if (record && handle) {
      const frame: OutboundEnvelope = { ...envelope, timestamp: new Date().toISOString() };
      try {
        await this.writeFrame(userId, handle, frame);
        this.recordSent(record);
        this.logger.debug(`[${userId}] Sent ${envelope.type}`);
        return true;
      } catch (error) {
        this.logger.warn(
          `[${userId}] Write failed, treating as disconnect: ${errorMessage(error)}`
        );
        this.disconnect(userId, handle);
      }
    }

    if (queueIfOffline) {
      this.enqueue(userId, envelope);
      this.logger.debug(`[${userId}] Queued ${envelope.type} for offline user`);
    }
    return false;
  }

  /**
   * Deliver every queued envelope in order, after a single queued-count notice.
   * Anything that cannot be written goes back into the bounded queue.
   */
  private async flushQueue(userId: string, handle: ConnectionHandle): Promise<void> {
    const pending = this.queues.get(userId);
    if (!pending || pending.length === 0) {
      return;
    }
    this.queues.delete(userId);

    const count = pending.length;
    const notice: SystemNotificationEnvelope = {
      type: EnvelopeType.SYSTEM_NOTIFICATION,
      notification: {
        type: NotificationType.QUEUED_MESSAGES,
        count,
        message: `You have ${count} unread messages`,
      },
    };
    await this.deliver(userId, notice, false);

    let delivered = 0;
    for (let index = 0; index < pending.length; index++) {
      const envelope = pending[index];

      if (this.records.get(userId)?.handle !== handle) {
        this.enqueue(userId, envelope);
        continue;
      }

      const sent = await this.deliver(userId, { ...envelope, deliveredFromQueue: true }, false);
      if (sent) {
        delivered++;
      } else {
        this.enqueue(userId, envelope);
      }

      if (index < pending.length - 1) {
        await sleep(this.flushDelayMs);
      }
    }

    this.logger.log(`[${userId}] Delivered ${delivered}/${count} queued messages`);
  }

  /**
   * Broadcast write for one user; callers must hold the user's lock
   */
  private async writeBroadcast(
    record: ConnectionRecord,
    frame: OutboundEnvelope
  ): Promise<'sent' | 'failed' | 'skipped'> {
    const handle = record.handle;
    if (!handle) {
      return 'skipped';
    }

    try {
      await this.writeFrame(record.userId, handle, frame);
      this.recordSent(record);
      return 'sent';
    } catch (error) {
      this.logger.error(`[${record.userId}] Broadcast failed: ${errorMessage(error)}`);
      this.disconnect(record.userId, handle);
      return 'failed';
    }
  }

  private enqueue(userId: string, envelope: OutboundEnvelope): void {
    const queue = this.queues.get(userId) ?? [];
    queue.push({ ...envelope, queuedAt: envelope.queuedAt ?? new Date().toISOString() });

    // Oldest entries go first once the bound is reached
    const overflow = queue.length - this.maxQueueSize;
    if (overflow > 0) {
      queue.splice(0, overflow);
      this.logger.debug(`[${userId}] Queue full, evicted ${overflow} oldest`);
    }

    this.queues.set(userId, queue);
  }

  private writeFrame(
    userId: string,
    handle: ConnectionHandle,
    frame: OutboundEnvelope
  ): Promise<void> {
    if (handle.readyState !== ConnectionReadyState.OPEN) {
      return Promise.reject(new TransportFailureError(userId, 'connection is not open'));
    }

    const payload = JSON.stringify(frame);
    const write = new Promise<void>((resolve, reject) => {
      try {
        handle.send(payload, (error) => {
          if (error) {
            reject(new TransportFailureError(userId, error.message));
          } else {
            resolve();
          }
        });
      } catch (error) {
        reject(new TransportFailureError(userId, errorMessage(error)));
      }
    });

    return withTimeout(write, this.writeTimeoutMs, `Write to ${userId} timed out`);
  }

  private closeQuietly(
    userId: string,
    handle: ConnectionHandle,
    code: number,
    reason: string
  ): void {
    try {
      handle.close(code, reason);
    } catch (error) {
      this.logger.debug(`[${userId}] Close failed (ignored): ${errorMessage(error)}`);
    }
  }

  private buildWelcome(userId: string): ConnectionEstablishedEnvelope {
    return {
      type: EnvelopeType.CONNECTION_ESTABLISHED,
      message: 'Welcome to the professional network agent gateway',
      userId,
      features: {
        realTimeChat: true,
        agentCommunication: true,
        liveUpdates: true,
      },
      availableAgents: Object.values(AgentType),
      timestamp: new Date().toISOString(),
    };
  }

  private recordSent(record: ConnectionRecord): void {
    record.metadata.messagesSent += 1;
    this.stats.messagesSent += 1;
    this.touch(record);
  }

  /**
   * lastActivity never moves backwards
   */
  private touch(record: ConnectionRecord): void {
    const now = Date.now();
    const last = record.metadata.lastActivity.getTime();
    record.metadata.lastActivity = new Date(Math.max(now, last));
  }
}
