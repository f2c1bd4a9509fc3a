import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (60 requests per minute per IP).
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    message: { code: 'TOO_MANY_REQUESTS', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for signin (10 requests per minute per IP).
 */
export function createSigninRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    max: 10,
    message: { code: 'TOO_MANY_REQUESTS', message: 'Too many signin attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
