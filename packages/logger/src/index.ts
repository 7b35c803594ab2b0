export * from "./interface.js";
export {getEmptyLogger} from "./empty.js";
export {getEnvLogger, getEnvLogLevel} from "./env.js";
export {getConsoleLogger, WinstonLogger} from "./winston.js";
