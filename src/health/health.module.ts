import { Module } from "@nestjs/common";
import { HealthController } from "./health.controller";
import { ModelsModule } from "../models/models.module";

/**
 * Health Module
 *
 * Database reachability and model availability for load balancers.
 */
@Module({
  imports: [ModelsModule],
  controllers: [HealthController],
})
export class HealthModule {}
