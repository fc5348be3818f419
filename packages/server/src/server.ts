import { resolve } from "node:path";
import { createApp } from "./app.js";
import { loadServerConfig } from "./config.js";

const config = loadServerConfig();

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`\nDTED elevation server running at http://localhost:${config.port}`);
  console.log(`Tiles: ${resolve(config.tilesDir)} (level ${config.level})`);
  console.log(`OpenAPI: http://localhost:${config.port}/api-docs\n`);
});
