import { Controller, Get, Param } from '@nestjs/common';
import {
  ConnectionRegistryService,
  ConnectionStats,
  UserConnectionInfo,
} from '@career-agent/agent/connections';
import { ConversationStoreService } from '@career-agent/agent/session';
import { AgentRouterService } from '@career-agent/agent/core';

export interface HealthReport {
  status: 'healthy';
  components: {
    connections: ConnectionStats;
    conversations: { total: number };
    agents: { registered: string[] };
  };
  uptimeSeconds: number;
  timestamp: string;
}

/**
 * Operational status: health and connection metrics
 */
@Controller('api')
export class StatusController {
  constructor(
    private readonly registry: ConnectionRegistryService,
    private readonly store: ConversationStoreService,
    private readonly router: AgentRouterService
  ) {}

  /**
   * Route: GET /api/health
   */
  @Get('health')
  async health(): Promise<HealthReport> {
    return {
      status: 'healthy',
      components: {
        connections: this.registry.getStats(),
        conversations: { total: await this.store.countConversations() },
        agents: { registered: this.router.listAgents() },
      },
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Route: GET /api/connections/stats
   */
  @Get('connections/stats')
  getConnectionStats(): ConnectionStats {
    return this.registry.getStats();
  }

  /**
   * Route: GET /api/connections/:userId
   */
  @Get('connections/:userId')
  getUserConnection(@Param('userId') userId: string): UserConnectionInfo {
    return this.registry.getUserConnectionInfo(userId);
  }
}
