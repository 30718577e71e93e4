import { Module } from '@nestjs/common';

import { IotaKeyringService } from './iota.service';

@Module({
  providers: [IotaKeyringService],
  exports: [IotaKeyringService],
})
export class IotaModule {}
