import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { IndexError } from "../errors.js";
import { createLogger } from "../logger.js";
import { createRagPipeline } from "../rag/pipeline.js";
import { createAppServer } from "../server.js";
import { CloudApiClient } from "../whatsapp/client.js";
import { WebhookGateway } from "../whatsapp/gateway.js";

const logger = createLogger("serve");

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the webhook and query server")
    .option("-p, --port <port>", "Port to listen on (overrides PORT)")
    .action(async (opts: { port?: string }) => {
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);

      try {
        await pipeline.index.load();
      } catch (err: unknown) {
        if (!(err instanceof IndexError)) throw err;
        logger.error({ err }, "Index could not be loaded, serving without a knowledge base");
      }

      const gateway = config.whatsapp
        ? new WebhookGateway({
            answerer: pipeline,
            client: new CloudApiClient(config.whatsapp),
            appSecret: config.whatsapp.appSecret,
            verifyToken: config.whatsapp.verifyToken,
            dedup: config.dedup,
            retry: config.dispatch,
          })
        : null;
      if (!gateway) {
        logger.warn("WhatsApp credentials not set, webhook routes are disabled");
      }

      const port = opts.port ? Number.parseInt(opts.port, 10) : config.port;
      const server = createAppServer({ pipeline, gateway });
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, () => resolve());
      });
      logger.info({ port, webhook: gateway !== null }, "Server listening");

      const shutdown = (signal: string): void => {
        logger.info({ signal, pending: gateway?.pending ?? 0 }, "Shutting down");
        server.close();
        void (gateway?.drain() ?? Promise.resolve()).then(() => {
          logger.info("Drained in-flight events");
        });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
}
