import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ConnectionRegistryService } from './connection-registry.service';

@Module({
  imports: [ScheduleModule.forRoot()],
  providers: [ConnectionRegistryService],
  exports: [ConnectionRegistryService],
})
export class ConnectionsModule {}
