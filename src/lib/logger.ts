import pino from "pino";
import { ENV } from "./env";

const isTest = ENV.NODE_ENV === "test";
const isDev = ENV.NODE_ENV !== "production" && !isTest;

export const logger = pino({
  level: ENV.LOG_LEVEL || (isTest ? "silent" : "info"),
  ...(isDev
    ? {
        transport: {
          target: "pino-pretty",
          options: { translateTime: "SYS:standard" },
        },
      }
    : {}),
});
