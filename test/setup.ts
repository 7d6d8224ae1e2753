import { setLogLevel } from "../src/utils/logger.js";

setLogLevel(process.env.STRATUM_LOG_LEVEL === "debug" ? "debug" : "silent");
