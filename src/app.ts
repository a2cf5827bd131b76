import dotenv from "dotenv";
import { loadConfig } from "./config/config.js";
import { createApp } from "./routes.js";
import { ProtectAPI, createLogger } from "./util/index.js";

dotenv.config();

const config = loadConfig();
const logger = createLogger("gateway", { level: config.logLevel });
const api = new ProtectAPI({
  host: config.host,
  apiKey: config.apiKey,
  logger: createLogger("ProtectAPI", { level: config.logLevel }),
});

const app = createApp(api);

app.listen(config.port, () => {
  logger.info(`Protect gateway running on http://localhost:${config.port} (controller ${api.baseUrl})`);
});
