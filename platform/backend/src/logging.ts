import pino from "pino";
import config from "@/config";

const logger = pino({
  level: config.logging.level,
  base: { service: "prompt-builder" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
