import dotenv from "dotenv";
import { loadConfig } from "./config/app.config";
import { createContainer } from "./container";
import { createApp } from "./server/app";

dotenv.config();

const config = loadConfig();
const container = createContainer(config);
const app = createApp(container);

app.listen(config.port, () => {
  container.logger.info(`Backend server is running on http://localhost:${config.port}`, {
    vectorDb: config.vectorDb.type,
    model: config.ollama.model,
  });
});
