import { createLogger, format, transports } from "winston";
import * as config from "./config.js";

const logger = createLogger({
  level: config.LOG_LEVEL,
  format: format.combine(
    format.errors(),
    format.timestamp(),
    config.LOG_FORMAT === "json" ? format.json() : format.simple(),
  ),
  transports: [new transports.Console()],
});

export default logger;
