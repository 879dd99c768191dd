import { InMemoryGameDataRepository } from "./data/repository.js";
import { createWSServer } from "./server/ws.js";

const PORT = Number(process.env.PORT || 8080);

const repository = new InMemoryGameDataRepository();
const server = createWSServer({ port: PORT, repository });

process.on("SIGINT", () => {
  server.close();
  process.exit(0);
});

process.on("SIGTERM", () => {
  server.close();
  process.exit(0);
});
