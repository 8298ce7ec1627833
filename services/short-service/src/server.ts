import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const app = await buildApp({ config });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.port, host: config.host });
app.log.info(
  {
    port: config.port,
    maxLen: config.maxLen,
    minKeySize: config.minKeySize,
    ...config.build
  },
  "short-service started"
);
