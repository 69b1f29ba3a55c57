/**
 * Vitest global setup
 */

import { setLogLevel } from "../src/lib/logger";

process.env.NODE_ENV = "test";

// keep test output readable; failing requests still log at error
setLogLevel("error");
