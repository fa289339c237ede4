import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { DatabaseModule } from "./database/database.module";
import { HealthModule } from "./health/health.module";
import { ModelsModule } from "./models/models.module";
import { GesturesModule } from "./gestures/gestures.module";
import { PredictionsModule } from "./predictions/predictions.module";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // Lazy MySQL connection shared by the record services
    DatabaseModule,

    HealthModule,
    ModelsModule,
    GesturesModule,
    PredictionsModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
