import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { loadTransformersModel } from "./embedding/index.js";
import type { ModelLoader } from "./embedding/types.js";
import { EmbeddingService } from "./services/embedding-service.js";
import { errorMessage } from "./utils/errors.js";

export interface StartOptions {
  env?: NodeJS.ProcessEnv;
  loader?: ModelLoader;
}

/**
 * Reads configuration, loads the model and starts listening. Rejects without
 * listening when the configuration is invalid or the model cannot be loaded.
 */
export async function start(options: StartOptions = {}) {
  const config = loadConfig(options.env);

  const service = new EmbeddingService({
    modelName: config.modelName,
    loader:
      options.loader ??
      ((name) =>
        loadTransformersModel(name, {
          quantized: config.modelQuantized,
          cacheDir: config.modelCacheDir,
        })),
  });

  const app = buildApp({ service, logger: { level: config.logLevel } });

  try {
    await service.load(app.log);
  } catch (err) {
    app.log.fatal(
      { err, model: config.modelName },
      `Cannot start without model ${config.modelName}: ${errorMessage(err)}`,
    );
    throw err;
  }

  try {
    await app.listen({ host: config.host, port: config.port });
  } catch (err) {
    app.log.fatal({ err }, `Cannot listen on ${config.host}:${config.port}`);
    throw err;
  }

  return app;
}
