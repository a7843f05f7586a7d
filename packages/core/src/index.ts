export {
  type Result,
  Ok,
  Err,
  map,
  tryCatch,
  toError,
} from "./result.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
