import { loadConfig } from "./config";
import { logger, setLogLevel } from "./logger";
import { createApp } from "./transport";

const config = loadConfig();
setLogLevel(config.LOG_LEVEL);
const app = createApp(config);

app.listen(config.PORT, () => {
	logger.info(`SICI toolkit MCP server listening on port ${config.PORT} (default mode: ${config.SICI_MODE})`);
});
