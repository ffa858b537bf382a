import { createApp } from "./app.js";
import { loadConfig } from "./server/env.js";

const config = loadConfig();
const app = createApp({ config });

app.listen(config.port, "0.0.0.0", () => {
  console.log(`BFF listening at http://localhost:${config.port}`);
  console.log(`Serving fixtures from: ${config.fixturesDir}`);
});
