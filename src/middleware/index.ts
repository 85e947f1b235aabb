/**
 * Middleware exports.
 */

export { requireUser, type AuthVariables } from './auth';
export {
    RateLimitStore,
    checkRateLimit,
    createRateLimiter,
    extractClientIp,
    rateLimiters,
    type RateLimitConfig,
    type RateLimitResult,
} from './rateLimit';
