import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import type { EmbeddingService } from "./services/embedding-service.js";
import { metaRoutes } from "./routes/meta.js";
import { embeddingRoutes } from "./routes/embeddings.js";

export interface AppOptions {
  service: EmbeddingService;
  logger?: FastifyServerOptions["logger"];
}

// Undecodable bodies are a schema failure, same as a body of the wrong shape.
const BODY_DECODE_ERRORS = new Set([
  "FST_ERR_CTP_INVALID_JSON_BODY",
  "FST_ERR_CTP_EMPTY_JSON_BODY",
]);

export function buildApp(options: AppOptions) {
  const { service, logger = false } = options;
  const app = Fastify({ logger });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (BODY_DECODE_ERRORS.has(error.code)) {
      return reply.status(422).send({ detail: [{ path: "", message: error.message }] });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, `Unhandled error: ${error.message}`);
    }
    return reply.status(status).send({ detail: error.message });
  });

  app.register(metaRoutes(service));
  app.register(embeddingRoutes(service));

  app.addHook("onClose", async (instance) => {
    await service.close(instance.log);
  });

  return app;
}
