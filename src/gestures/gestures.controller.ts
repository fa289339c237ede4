import {
  BadRequestException,
  Body,
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
import { GesturesService } from "./gestures.service";
import { CreateGestureDto } from "./dto/create-gesture.dto";
import { GestureQueryDto } from "./dto/gesture-query.dto";
import { UpdateGestureDto } from "./dto/update-gesture.dto";
import {
  GestureCreatedDto,
  GestureResponseDto,
} from "./dto/gesture-response.dto";
import { DeletedDto, UpdatedDto } from "../common/dto/mutation-response.dto";

const INFERENCE_FIELDS = [
  "model_id",
  "predicted_label",
  "confidence",
  "probs",
  "processing_time_ms",
] as const;

/** Gestures submitted over HTTP are tagged with this source */
const API_SOURCE = "api";

@ApiTags("gestures")
@Controller("gestures")
export class GesturesController {
  constructor(private readonly gesturesService: GesturesService) {}

  @Get()
  @ApiOperation({ summary: "List gesture frames, newest first" })
  @ApiResponse({ status: 200, type: [GestureResponseDto] })
  async findAll(
    @Query() query: GestureQueryDto,
  ): Promise<GestureResponseDto[]> {
    const gestures = await this.gesturesService.retrieve({
      userId: query.user_id,
      limit: query.limit,
    });
    return gestures.map((gesture) => GestureResponseDto.fromEntity(gesture));
  }

  @Get(":id")
  @ApiOperation({ summary: "Get one gesture frame" })
  @ApiResponse({ status: 200, type: GestureResponseDto })
  @ApiResponse({ status: 404, description: "Gesture not found" })
  async findOne(
    @Param("id", ParseIntPipe) id: number,
  ): Promise<GestureResponseDto> {
    const gesture = await this.gesturesService.findOne(id);
    if (!gesture) {
      throw new NotFoundException("Gesture not found");
    }
    return GestureResponseDto.fromEntity(gesture);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: "Submit hand landmarks" })
  @ApiResponse({ status: 201, type: GestureCreatedDto })
  @ApiResponse({ status: 400, description: "Landmarks are not exactly 21 [x, y] points" })
  async create(@Body() dto: CreateGestureDto): Promise<GestureCreatedDto> {
    const gestureId = await this.gesturesService.create({
      landmarks: dto.landmarks,
      userId: dto.user_id,
      sessionId: dto.session_id,
      frameWidth: dto.frame_width,
      frameHeight: dto.frame_height,
      source: API_SOURCE,
    });
    return { gesture_id: gestureId };
  }

  /**
   * Attach an inference result. Any other change is not supported.
   */
  @Put(":id")
  @ApiOperation({ summary: "Attach an inference result to a gesture" })
  @ApiResponse({ status: 200, type: UpdatedDto })
  @ApiResponse({ status: 400, description: "Incomplete inference result" })
  @ApiResponse({ status: 404, description: "Gesture not found" })
  @ApiResponse({ status: 501, description: "Change is not supported" })
  async update(
    @Param("id", ParseIntPipe) id: number,
    @Body() dto: UpdateGestureDto,
  ): Promise<UpdatedDto> {
    const hasInference = INFERENCE_FIELDS.some(
      (field) => dto[field] !== undefined,
    );
    if (!hasInference || dto.landmarks !== undefined) {
      return this.gesturesService.update(id);
    }

    const { model_id, predicted_label, confidence } = dto;
    if (
      model_id === undefined ||
      predicted_label === undefined ||
      confidence === undefined
    ) {
      throw new BadRequestException(
        "model_id, predicted_label and confidence must be set together",
      );
    }

    const updated = await this.gesturesService.attachInference(id, {
      modelId: model_id,
      predictedLabel: predicted_label,
      confidence,
      probs: dto.probs,
      processingTimeMs: dto.processing_time_ms,
    });
    if (!updated) {
      throw new NotFoundException("Gesture not found");
    }
    return { updated: true };
  }

  @Delete(":id")
  @ApiOperation({ summary: "Delete a gesture frame" })
  @ApiResponse({ status: 200, type: DeletedDto })
  @ApiResponse({ status: 404, description: "Gesture not found" })
  async remove(@Param("id", ParseIntPipe) id: number): Promise<DeletedDto> {
    const deleted = await this.gesturesService.delete(id);
    if (!deleted) {
      throw new NotFoundException("Gesture not found");
    }
    return { deleted: true };
  }
}
