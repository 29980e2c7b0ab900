import { loadConfig, loadEnvFiles } from "../config";
import { createServices } from "../container";
import { createApp } from "./app";

loadEnvFiles();

const config = loadConfig();
const app = createApp(createServices(config));

// Start server
app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

export default app;
