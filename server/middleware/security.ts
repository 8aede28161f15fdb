/**
 * Security Middleware
 *
 * Security headers for every response, the shared API token check for the
 * chat endpoint, and a fixed-window rate limit per client.
 */

import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { AuthenticationError, RateLimitError } from '../utils/errorHandler';

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    res.setHeader('Referrer-Policy', 'no-referrer');

    // JSON API only
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}

const bodyTokenSchema = z.object({ api_token: z.string() });

function tokensMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Requires the configured API token in the body (`api_token`) or the
 * `x-api-key` header. Without a configured token every request passes.
 */
export function requireApiToken(apiToken?: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!apiToken) {
            return next();
        }

        const fromBody = bodyTokenSchema.safeParse(req.body);
        const provided = fromBody.success ? fromBody.data.api_token : req.get('x-api-key');

        if (!provided || !tokensMatch(provided, apiToken)) {
            console.warn(`[Security] Rejected chat request from ${req.ip || 'unknown'}: invalid API token`);
            return next(new AuthenticationError('Invalid API token'));
        }
        next();
    };
}

/**
 * Fixed-window rate limit keyed by client IP.
 */
export function rateLimit(options: { windowMs: number; maxRequests: number }): RequestHandler {
    const windows = new Map<string, { count: number; resetTime: number }>();

    return (req: Request, res: Response, next: NextFunction) => {
        const clientId = req.ip || 'unknown';
        const now = Date.now();
        const clientData = windows.get(clientId);

        if (!clientData || now > clientData.resetTime) {
            windows.set(clientId, { count: 1, resetTime: now + options.windowMs });
            return next();
        }

        if (clientData.count >= options.maxRequests) {
            const retryAfter = Math.ceil((clientData.resetTime - now) / 1000);
            res.set('Retry-After', retryAfter.toString());
            return next(new RateLimitError('Too many requests'));
        }

        clientData.count++;
        next();
    };
}
