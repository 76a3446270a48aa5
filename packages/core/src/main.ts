import { createBridgeHost } from "./index.js";
import { logger } from "./utils/logger.js";

createBridgeHost()
  .start()
  .catch((err: unknown) => {
    logger.error("Bridge host failed to start", { error: err });
    process.exitCode = 1;
  });
