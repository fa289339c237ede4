import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation } from "@nestjs/swagger";
import { AppService, ServiceDescriptor } from "./app.service";

@ApiTags("health")
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({
    summary: "Service descriptor",
    description: "Service name, version and the top-level endpoints.",
  })
  getRoot(): ServiceDescriptor {
    return this.appService.getDescriptor();
  }
}
