export type { LogHandler } from "./types.js";
export { FatalErrorHandler } from "./fatal.js";
export { ErrorFileHandler } from "./error-file.js";
export { WarningHandler } from "./warning.js";
export { UnclassifiedHandler, UNPROCESSED_PREFIX } from "./unclassified.js";
