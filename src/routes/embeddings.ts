import type { FastifyInstance } from "fastify";
import type { EmbeddingService } from "../services/embedding-service.js";
import {
  embeddingRequestSchema,
  type EmbeddingErrorKind,
  type EmbeddingResponse,
} from "../types/embedding.js";

const STATUS_BY_KIND: Record<EmbeddingErrorKind, number> = {
  not_ready: 503,
  empty_batch: 400,
  batch_too_large: 400,
  inference_failed: 500,
};

export function embeddingRoutes(service: EmbeddingService) {
  return async function (app: FastifyInstance): Promise<void> {
    app.post("/embeddings", async (request, reply) => {
      const parsed = embeddingRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(422).send({
          detail: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        });
      }

      const result = await service.embed(parsed.data, request.log);
      if (!result.ok) {
        return reply
          .status(STATUS_BY_KIND[result.error.kind])
          .send({ detail: result.error.message });
      }

      const response: EmbeddingResponse = { embeddings: result.embeddings };
      return response;
    });
  };
}
