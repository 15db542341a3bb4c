import { createApp, createServices } from "./app.js";
import { loadServerConfig } from "./config.js";

const config = loadServerConfig();
const app = createApp(createServices(config));

app.listen(config.port, () => {
  console.log(`\nAdaptive signal API server running at http://localhost:${config.port}`);
  console.log(`Detections forward to ${config.signalApiUrl}\n`);
});
