import { ApiProperty } from "@nestjs/swagger";

export class DeletedDto {
  @ApiProperty({ example: true })
  deleted!: true;
}

export class UpdatedDto {
  @ApiProperty({ example: true })
  updated!: true;
}
