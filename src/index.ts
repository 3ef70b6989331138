import { loadConfig } from "./config";
import { buildServer } from "./server";

const config = loadConfig();
const app = buildServer(config);

async function main() {
  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
