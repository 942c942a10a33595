import { maxItemsFrom, startServer } from "./http/server.js";

const port = Number(process.env.PORT ?? 3000);
const maxItems = maxItemsFrom(process.env.MAX_ITEMS);

const { server } = await startServer({ port, maxItems });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port} (max ${maxItems} items per request)`);
