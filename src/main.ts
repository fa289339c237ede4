import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { NestExpressApplication } from "@nestjs/platform-express";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import {
  SERVICE_DESCRIPTION,
  SERVICE_NAME,
  SERVICE_VERSION,
} from "./app.service";

const DEFAULT_PORT = 8001;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["log", "error", "warn"],
  });
  const logger = new Logger("Bootstrap");

  app.disable("x-powered-by");
  configureApp(app);
  app.enableShutdownHooks();

  // Enable CORS for development
  app.enableCors({
    origin: process.env.NODE_ENV === "production" ? false : "*",
  });

  // Swagger/OpenAPI Documentation
  const config = new DocumentBuilder()
    .setTitle(SERVICE_NAME)
    .setDescription(SERVICE_DESCRIPTION)
    .setVersion(SERVICE_VERSION)
    .addTag("gestures", "Hand landmark frames and attached inference results")
    .addTag("models", "ML model registration and lookup")
    .addTag("predictions", "Batch prediction jobs and their completion")
    .addTag("health", "Health check and service information")
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("docs", app, document, {
    customSiteTitle: `${SERVICE_NAME} Documentation`,
  });

  const port = Number(process.env.PORT) || DEFAULT_PORT;
  await app.listen(port);

  logger.log(`${SERVICE_NAME} running on: http://localhost:${port}`);
  logger.log(`API Documentation: http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger("Bootstrap");
  logger.error(
    "Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
