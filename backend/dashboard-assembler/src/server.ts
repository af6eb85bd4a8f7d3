import { buildApp } from "./app.js";
import { loadAssemblerConfig, loadServerConfig } from "./config.js";

async function bootstrap() {
  const server = loadServerConfig();
  const fastify = await buildApp({ assembler: loadAssemblerConfig(), server });

  await fastify.listen({ port: server.port, host: server.host });
  console.log(`Dashboard assembler listening on http://${server.host}:${server.port}`);
}

bootstrap().catch((e) => {
  console.error(e);
  process.exit(1);
});
