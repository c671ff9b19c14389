import type { FastifyInstance } from "fastify";
import type { EmbeddingService } from "../services/embedding-service.js";
import type { ServiceInfo } from "../types/embedding.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../config.js";

const MODEL_NOT_LOADED = { detail: "Model not loaded" };

export function metaRoutes(service: EmbeddingService) {
  return async function (app: FastifyInstance): Promise<void> {
    app.get("/", async (): Promise<ServiceInfo> => ({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      model: service.modelName,
      status: "running",
    }));

    app.get("/health", async (_request, reply) => {
      if (!service.isReady()) {
        return reply.status(503).send(MODEL_NOT_LOADED);
      }
      return { status: "healthy", model_loaded: true };
    });

    app.get("/model/info", async (_request, reply) => {
      const info = service.info();
      if (!info) {
        return reply.status(503).send(MODEL_NOT_LOADED);
      }
      return info;
    });
  };
}
