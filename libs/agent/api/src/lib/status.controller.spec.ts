import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConnectionRegistryService } from '@career-agent/agent/connections';
import { MockConnection } from '@career-agent/agent/connections/testing';
import { ConversationStoreService } from '@career-agent/agent/session';
import { AgentRouterService } from '@career-agent/agent/core';
import { StatusController } from './status.controller';

describe('StatusController', () => {
  let controller: StatusController;
  let registry: ConnectionRegistryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [StatusController],
      providers: [
        ConnectionRegistryService,
        { provide: ConfigService, useValue: new ConfigService({ connections: { flushDelayMs: 0 } }) },
        { provide: ConversationStoreService, useValue: { countConversations: jest.fn().mockResolvedValue(3) } },
        { provide: AgentRouterService, useValue: { listAgents: jest.fn(() => ['career_advisor']) } },
      ],
    }).compile();

    controller = module.get<StatusController>(StatusController);
    registry = module.get<ConnectionRegistryService>(ConnectionRegistryService);
  });

  it('should report component status', async () => {
    await registry.connect(new MockConnection(), 'u1');

    const report = await controller.health();

    expect(report.status).toBe('healthy');
    expect(report.components.conversations).toEqual({ total: 3 });
    expect(report.components.agents).toEqual({ registered: ['career_advisor'] });
    expect(report.components.connections).toMatchObject({ totalConnections: 1, activeConnections: 1 });
  });

  it('should return connection stats', async () => {
    await registry.connect(new MockConnection(), 'u1');
    await registry.send('u1', { type: 'ping' });
    await registry.send('u2', { type: 'ping' });

    expect(controller.getConnectionStats()).toEqual({
      totalConnections: 1,
      activeConnections: 1,
      messagesSent: 1,
      messagesReceived: 0,
      queuedMessages: 1,
      activeConversations: 0,
    });
  });

  it('should return per-user connection info', () => {
    expect(controller.getUserConnection('nobody')).toEqual({
      userId: 'nobody',
      state: 'absent',
      connected: false,
      metadata: null,
      queuedMessages: 0,
      activeConversations: [],
    });
  });
});
