import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { validateEnvironment } from "./config/env.validation";
import { DatabaseModule } from "./database/database.module";
import { ElvModule } from "./elv/elv.module";
import { HealthController } from "./health.controller";
import { SyncModule } from "./sync/sync.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ["../../.env", ".env"],
      validate: validateEnvironment,
    }),
    DatabaseModule,
    ElvModule,
    SyncModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
