import { Injectable, Logger } from "@nestjs/common";
import { Repository } from "typeorm";
import { MLModel } from "./entities/ml-model.entity";
import { ConnectionManager } from "../database/connection-manager.service";
import { RecordService } from "../database/record-service.interface";
import { readInsertedId, runStatement } from "../database/statement.util";
import { UnsupportedOperationError } from "../common/errors/storage.errors";
import { JsonObject } from "../common/types/json.type";

export interface CreateModelFields {
  name: string;
  version: string;
  modelType: string;
  artifactUri: string;
  inputShape: number[];
  outputShape: number[];
  status?: string;
  metrics?: JsonObject | null;
  sha256?: string | null;
}

export const DEFAULT_MODEL_STATUS = "active";

/**
 * ModelsService
 *
 * Register, list and delete model metadata in the `models` table.
 */
@Injectable()
export class ModelsService
  implements RecordService<CreateModelFields, MLModel, number>
{
  private readonly logger = new Logger(ModelsService.name);

  constructor(private readonly connections: ConnectionManager) {}

  /**
   * Register a model and return its auto-increment id.
   *
   * @throws DuplicateRecordError when the name/version pair already exists
   */
  async create(fields: CreateModelFields): Promise<number> {
    return runStatement(this.logger, "models.create", async () => {
      const repository = await this.repository();
      const result = await repository.insert({
        name: fields.name,
        version: fields.version,
        modelType: fields.modelType,
        artifactUri: fields.artifactUri,
        inputShape: fields.inputShape,
        outputShape: fields.outputShape,
        status: fields.status ?? DEFAULT_MODEL_STATUS,
        metrics: fields.metrics ?? null,
        sha256: fields.sha256 ?? null,
      });
      return readInsertedId(result.identifiers);
    });
  }

  /**
   * All models newest first, or the zero-or-one row matching `id`.
   */
  async retrieve(id?: number): Promise<MLModel[]> {
    return runStatement(this.logger, "models.retrieve", async () => {
      const repository = await this.repository();
      if (id === undefined) {
        return repository.find({ order: { createdAt: "DESC", id: "DESC" } });
      }
      return repository.find({ where: { id } });
    });
  }

  async countActive(): Promise<number> {
    return runStatement(this.logger, "models.countActive", async () => {
      const repository = await this.repository();
      return repository.count({ where: { status: DEFAULT_MODEL_STATUS } });
    });
  }

  async update(id: number): Promise<never> {
    throw new UnsupportedOperationError(
      `Updating model ${id} is not supported`,
    );
  }

  async delete(id: number): Promise<boolean> {
    return runStatement(this.logger, "models.delete", async () => {
      const repository = await this.repository();
      const result = await repository.delete({ id });
      return (result.affected ?? 0) > 0;
    });
  }

  private repository(): Promise<Repository<MLModel>> {
    return this.connections.repository(MLModel);
  }
}
