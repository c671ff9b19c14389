import { ConfigError } from "./config.js";
import { start } from "./server.js";

try {
  const app = await start();

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info(`Received ${signal}, closing`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Error during shutdown");
          process.exit(1);
        },
      );
    });
  }
} catch (err) {
  // Config errors happen before a logger exists; everything else is logged by start().
  if (err instanceof ConfigError) {
    console.error(err.message);
  }
  process.exit(1);
}
