import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthController } from "./health.controller";
import { IotaModule } from "./iota/iota.module";
import { RegistryModule } from "./registry/registry.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ["../../.env", ".env"],
    }),
    EventEmitterModule.forRoot(),
    IotaModule,
    RegistryModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
