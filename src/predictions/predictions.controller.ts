import {
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { PredictionsService } from "./predictions.service";
import { CreatePredictionDto } from "./dto/create-prediction.dto";
import { PredictionQueryDto } from "./dto/prediction-query.dto";
import { UpdatePredictionDto } from "./dto/update-prediction.dto";
import {
  PredictionCreatedDto,
  PredictionResponseDto,
} from "./dto/prediction-response.dto";
import { INITIAL_PREDICTION_STATUS } from "./types/prediction-status.type";
import { DeletedDto, UpdatedDto } from "../common/dto/mutation-response.dto";

@ApiTags("predictions")
@Controller("predictions")
export class PredictionsController {
  constructor(private readonly predictionsService: PredictionsService) {}

  @Get()
  @ApiOperation({ summary: "List prediction jobs, newest first" })
  @ApiResponse({ status: 200, type: [PredictionResponseDto] })
  async findAll(
    @Query() query: PredictionQueryDto,
  ): Promise<PredictionResponseDto[]> {
    const predictions = await this.predictionsService.retrieve({
      sessionId: query.session_id,
      limit: query.limit,
    });
    return predictions.map((prediction) =>
      PredictionResponseDto.fromEntity(prediction),
    );
  }

  @Get(":id")
  @ApiOperation({ summary: "Get one prediction job" })
  @ApiResponse({ status: 200, type: PredictionResponseDto })
  @ApiResponse({ status: 404, description: "Prediction not found" })
  async findOne(
    @Param("id", ParseIntPipe) id: number,
  ): Promise<PredictionResponseDto> {
    const prediction = await this.predictionsService.findOne(id);
    if (!prediction) {
      throw new NotFoundException("Prediction not found");
    }
    return PredictionResponseDto.fromEntity(prediction);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: "Queue a batch prediction job" })
  @ApiResponse({ status: 201, type: PredictionCreatedDto })
  async create(
    @Body() dto: CreatePredictionDto,
  ): Promise<PredictionCreatedDto> {
    const predictionId = await this.predictionsService.create({
      requestorUserId: dto.requestor_user_id,
      sessionId: dto.session_id,
      modelId: dto.model_id,
      params: dto.params,
    });
    return { prediction_id: predictionId, status: INITIAL_PREDICTION_STATUS };
  }

  /**
   * Record the outcome of a queued job. Any other change is not supported.
   */
  @Put(":id")
  @ApiOperation({ summary: "Complete a prediction job" })
  @ApiResponse({ status: 200, type: UpdatedDto })
  @ApiResponse({ status: 400, description: "Success without output_text" })
  @ApiResponse({ status: 404, description: "Prediction not found" })
  @ApiResponse({ status: 409, description: "Prediction already completed" })
  @ApiResponse({ status: 501, description: "Change is not supported" })
  async update(
    @Param("id", ParseIntPipe) id: number,
    @Body() dto: UpdatePredictionDto,
  ): Promise<UpdatedDto> {
    const isCompletion = [
      dto.output_text,
      dto.confidence,
      dto.latency_ms,
      dto.error_message,
    ].some((value) => value !== undefined);
    if (!isCompletion) {
      return this.predictionsService.update(id);
    }

    const completed = await this.predictionsService.markComplete(id, {
      outputText: dto.output_text,
      confidence: dto.confidence,
      latencyMs: dto.latency_ms,
      errorMessage: dto.error_message,
    });
    if (!completed) {
      const existing = await this.predictionsService.findOne(id);
      if (!existing) {
        throw new NotFoundException("Prediction not found");
      }
      throw new ConflictException(
        `Prediction ${id} is already ${existing.status}`,
      );
    }
    return { updated: true };
  }

  @Delete(":id")
  @ApiOperation({ summary: "Delete a prediction job" })
  @ApiResponse({ status: 200, type: DeletedDto })
  @ApiResponse({ status: 404, description: "Prediction not found" })
  async remove(@Param("id", ParseIntPipe) id: number): Promise<DeletedDto> {
    const deleted = await this.predictionsService.delete(id);
    if (!deleted) {
      throw new NotFoundException("Prediction not found");
    }
    return { deleted: true };
  }
}
