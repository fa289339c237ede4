import { ApiProperty } from "@nestjs/swagger";
import {
  ArrayNotEmpty,
  IsArray,
  IsHash,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from "class-validator";
import { JsonObject } from "../../common/types/json.type";

/**
 * POST /models body
 *
 * `model_path` is stored as the artifact URI and `output_classes` becomes
 * the single-dimension output shape.
 */
export class RegisterModelDto {
  @ApiProperty({ example: "ASL Keypoint Classifier" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ example: "v2.1.0" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  version!: string;

  @ApiProperty({
    example: "classification",
    default: "classification",
    required: false,
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  model_type: string = "classification";

  @ApiProperty({
    description: "File path or URL of the serialized model",
    example: "/models/asl_classifier_v2.tflite",
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(1024)
  model_path!: string;

  @ApiProperty({ type: [Number], example: [42] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(1, { each: true })
  input_shape!: number[];

  @ApiProperty({ description: "Number of output classes", example: 37 })
  @IsInt()
  @Min(1)
  output_classes!: number;

  @ApiProperty({ example: "active", required: false })
  @IsOptional()
  @IsString()
  @MaxLength(32)
  status?: string;

  @ApiProperty({
    description: "Opaque evaluation metrics",
    example: { accuracy: 0.94 },
    required: false,
  })
  @IsOptional()
  @IsObject()
  metrics?: JsonObject;

  @ApiProperty({ description: "SHA-256 of the artifact", required: false })
  @IsOptional()
  @IsHash("sha256")
  sha256?: string;
}
