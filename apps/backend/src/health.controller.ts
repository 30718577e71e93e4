import { Controller, Get, Inject } from '@nestjs/common';

import { RegistryService } from './registry/registry.service';

@Controller('health')
export class HealthController {
  constructor(@Inject(RegistryService) private readonly registry: RegistryService) {}

  @Get()
  status() {
    return {
      status: 'ok',
      service: 'vehicle-did-registry-backend',
      sequence: this.registry.sequence,
      time: new Date().toISOString(),
    };
  }
}
