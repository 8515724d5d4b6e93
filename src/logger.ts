import pino from "pino";
import { config } from "./config.js";

export const logger = pino({
  name: "jsonapi-codec",
  level: config.logLevel,
  ...(config.logFile
    ? {
        transport: {
          target: "pino/file",
          options: {
            destination: config.logFile,
            mkdir: true
          }
        }
      }
    : {})
});
