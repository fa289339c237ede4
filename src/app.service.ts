import { Injectable } from "@nestjs/common";
import * as packageJson from "../package.json";

export const SERVICE_NAME = "Gesture Model Serving API";
export const SERVICE_VERSION: string = packageJson.version;
export const SERVICE_DESCRIPTION =
  "Model registry, hand landmark capture and batch prediction tracking for hand gesture recognition";

export interface ServiceDescriptor {
  service: string;
  version: string;
  description: string;
  endpoints: Record<string, string>;
}

@Injectable()
export class AppService {
  getDescriptor(): ServiceDescriptor {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: SERVICE_DESCRIPTION,
      endpoints: {
        docs: "/docs",
        health: "/health",
        gestures: "/gestures",
        models: "/models",
        predictions: "/predictions",
      },
    };
  }
}
