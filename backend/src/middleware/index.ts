export { validate, schemas } from "./validation.js";
export { logger, requestLogger } from "./logging.js";
export { authenticate, requireServiceToken } from "./auth.js";
export { rateLimit, standardRateLimit, serviceRateLimit, clearRateLimitStore } from "./rateLimit.js";
