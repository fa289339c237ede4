import {
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
} from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { ModelsService } from "./models.service";
import { RegisterModelDto } from "./dto/register-model.dto";
import { ModelCreatedDto, ModelResponseDto } from "./dto/model-response.dto";
import { DeletedDto } from "../common/dto/mutation-response.dto";

@ApiTags("models")
@Controller("models")
export class ModelsController {
  constructor(private readonly modelsService: ModelsService) {}

  @Get()
  @ApiOperation({ summary: "List registered models, newest first" })
  @ApiResponse({ status: 200, type: [ModelResponseDto] })
  async findAll(): Promise<ModelResponseDto[]> {
    const models = await this.modelsService.retrieve();
    return models.map((model) => ModelResponseDto.fromEntity(model));
  }

  @Get(":id")
  @ApiOperation({ summary: "Get one model" })
  @ApiResponse({ status: 200, type: ModelResponseDto })
  @ApiResponse({ status: 404, description: "Model not found" })
  async findOne(
    @Param("id", ParseIntPipe) id: number,
  ): Promise<ModelResponseDto> {
    const [model] = await this.modelsService.retrieve(id);
    if (!model) {
      throw new NotFoundException("Model not found");
    }
    return ModelResponseDto.fromEntity(model);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: "Register a model" })
  @ApiResponse({ status: 201, type: ModelCreatedDto })
  @ApiResponse({ status: 400, description: "Missing or invalid fields" })
  @ApiResponse({ status: 409, description: "Name and version already exist" })
  async register(@Body() dto: RegisterModelDto): Promise<ModelCreatedDto> {
    const modelId = await this.modelsService.create({
      name: dto.name,
      version: dto.version,
      modelType: dto.model_type,
      artifactUri: dto.model_path,
      inputShape: dto.input_shape,
      outputShape: [dto.output_classes],
      status: dto.status,
      metrics: dto.metrics,
      sha256: dto.sha256,
    });
    return { model_id: modelId };
  }

  @Delete(":id")
  @ApiOperation({ summary: "Delete a model" })
  @ApiResponse({ status: 200, type: DeletedDto })
  @ApiResponse({ status: 404, description: "Model not found" })
  async remove(@Param("id", ParseIntPipe) id: number): Promise<DeletedDto> {
    const deleted = await this.modelsService.delete(id);
    if (!deleted) {
      throw new NotFoundException("Model not found");
    }
    return { deleted: true };
  }
}
