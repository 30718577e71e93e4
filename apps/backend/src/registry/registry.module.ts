import { Module } from '@nestjs/common';

import { IotaModule } from '../iota/iota.module';
import { RegistryController } from './registry.controller';
import { RegistryService } from './registry.service';
import { SnapshotStore } from './snapshot.store';

@Module({
  imports: [IotaModule],
  controllers: [RegistryController],
  providers: [RegistryService, SnapshotStore],
  exports: [RegistryService],
})
export class RegistryModule {}
