import { startWsServer } from "./wsServer";
import { loadConfig } from "../config";

async function main() {
  const config = loadConfig();

  const server = startWsServer({ port: config.wsPort, defaultRule: config.repetitionRule });
  console.log(`Solver WS server listening on ws://localhost:${server.port}`);
  console.log("Options:", JSON.stringify({ repetitionRule: config.repetitionRule }, null, 2));

  const shutdown = () => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error(err);
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
