import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConnectionManager } from "../database/connection-manager.service";
import { ModelsService } from "../models/models.service";
import { SERVICE_NAME, SERVICE_VERSION } from "../app.service";

type ModelStatus = "loaded" | "no_active_model" | "unknown";

interface HealthStatus {
  status: "healthy" | "degraded";
  timestamp: string;
  service: string;
  version: string;
  database_status: "connected" | "unreachable";
  model_status: ModelStatus;
}

@ApiTags("health")
@Controller("health")
export class HealthController {
  constructor(
    private readonly connections: ConnectionManager,
    private readonly modelsService: ModelsService,
  ) {}

  @Get()
  @ApiOperation({
    summary: "System health check",
    description:
      "Checks database connectivity and whether an active model is registered.",
  })
  @ApiResponse({
    status: 200,
    description: "Health status retrieved successfully",
    schema: {
      type: "object",
      properties: {
        status: { type: "string", example: "healthy" },
        timestamp: { type: "string", format: "date-time" },
        service: { type: "string" },
        version: { type: "string" },
        database_status: { type: "string", example: "connected" },
        model_status: { type: "string", example: "loaded" },
      },
    },
  })
  async getHealth(): Promise<HealthStatus> {
    const dbOk = await this.connections.ping();
    const modelStatus = dbOk ? await this.getModelStatus() : "unknown";

    return {
      status: dbOk ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      database_status: dbOk ? "connected" : "unreachable",
      model_status: modelStatus,
    };
  }

  @Get("ping")
  ping(): { message: string; timestamp: string } {
    return {
      message: "pong",
      timestamp: new Date().toISOString(),
    };
  }

  private async getModelStatus(): Promise<ModelStatus> {
    try {
      const activeModels = await this.modelsService.countActive();
      return activeModels > 0 ? "loaded" : "no_active_model";
    } catch {
      // Already logged by the models service
      return "unknown";
    }
  }
}
