import { app } from "./app";
import { env } from "../config/env";
import { createLogger } from "../utils/logger";

const logger = createLogger("server");

app.listen(env.TS_API_PORT, () => {
  logger.info("listening", { url: `http://127.0.0.1:${env.TS_API_PORT}` });
});
