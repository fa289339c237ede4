import { Test, TestingModule } from "@nestjs/testing";
import { HealthController } from "./health.controller";
import { ConnectionManager } from "../database/connection-manager.service";
import { ModelsService } from "../models/models.service";
import { StorageError } from "../common/errors/storage.errors";
import { SERVICE_NAME, SERVICE_VERSION } from "../app.service";

describe("HealthController", () => {
  let controller: HealthController;

  const mockConnections = {
    ping: jest.fn(),
  };

  const mockModelsService = {
    countActive: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: ConnectionManager, useValue: mockConnections },
        { provide: ModelsService, useValue: mockModelsService },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
    jest.clearAllMocks();
  });

  it("should report healthy with a loaded model", async () => {
    mockConnections.ping.mockResolvedValue(true);
    mockModelsService.countActive.mockResolvedValue(1);

    const health = await controller.getHealth();

    expect(health).toEqual({
      status: "healthy",
      timestamp: expect.any(String),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      database_status: "connected",
      model_status: "loaded",
    });
  });

  it("should report when no model is active", async () => {
    mockConnections.ping.mockResolvedValue(true);
    mockModelsService.countActive.mockResolvedValue(0);

    const health = await controller.getHealth();

    expect(health.status).toBe("healthy");
    expect(health.model_status).toBe("no_active_model");
  });

  it("should report degraded when the database is unreachable", async () => {
    mockConnections.ping.mockResolvedValue(false);

    const health = await controller.getHealth();

    expect(health.status).toBe("degraded");
    expect(health.database_status).toBe("unreachable");
    expect(health.model_status).toBe("unknown");
    expect(mockModelsService.countActive).not.toHaveBeenCalled();
  });

  it("should report an unknown model status when the count fails", async () => {
    mockConnections.ping.mockResolvedValue(true);
    mockModelsService.countActive.mockRejectedValue(
      new StorageError("models.countActive", "Table 'models' doesn't exist"),
    );

    const health = await controller.getHealth();

    expect(health.status).toBe("healthy");
    expect(health.model_status).toBe("unknown");
  });

  it("should answer ping", () => {
    expect(controller.ping()).toEqual({
      message: "pong",
      timestamp: expect.any(String),
    });
  });
});
