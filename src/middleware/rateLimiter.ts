import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger';

/**
 * Wake rate limiter
 * Allows 20 wake requests (page loads and PIN submissions) per minute per IP
 */
export const wakeLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  handler: (req, res) => {
    logger.warn(`Wake rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many wake requests. Please wait before trying again.',
      retryAfter: '1 minute',
    });
  },
});

/**
 * Readiness status limiter
 * Clients poll every couple of seconds while a server boots, so this is generous
 */
export const statusLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 120,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Status polling rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many status checks. Slow down the polling interval.',
      retryAfter: '1 minute',
    });
  },
});

/**
 * Admin login limiter
 * 10 attempts per 15 minutes per IP
 */
export const authLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  // Only failed logins count against the window
  skipSuccessfulRequests: true,
  handler: (req, res) => {
    logger.warn(`Admin login rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many login attempts. Please try again later.',
      retryAfter: '15 minutes',
    });
  },
});

export const healthLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Health rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many health check requests.',
      retryAfter: '1 minute',
    });
  },
});
