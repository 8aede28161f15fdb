import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Request, Response, NextFunction } from "express";
import {
    addSecurityHeaders,
    requireApiToken,
    rateLimit
} from "../middleware/security";
import { AuthenticationError, RateLimitError } from "../utils/errorHandler";

describe("Security Middleware", () => {
    let headers: Record<string, string>;
    let mockReq: Partial<Request>;
    let mockRes: Partial<Response>;
    let mockNext: NextFunction;

    beforeEach(() => {
        headers = {};
        const get = vi.fn();
        get.mockImplementation((name: string) => headers[name.toLowerCase()]);
        mockReq = {
            ip: '127.0.0.1',
            body: {},
            get,
        };
        mockRes = {
            setHeader: vi.fn(),
            status: vi.fn().mockReturnThis(),
            json: vi.fn(),
            set: vi.fn(),
        };
        mockNext = vi.fn();
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("addSecurityHeaders", () => {
        it("should add all required security headers", () => {
            addSecurityHeaders(mockReq as Request, mockRes as Response, mockNext);

            expect(mockRes.setHeader).toHaveBeenCalledWith('X-Frame-Options', 'DENY');
            expect(mockRes.setHeader).toHaveBeenCalledWith('X-Content-Type-Options', 'nosniff');
            expect(mockRes.setHeader).toHaveBeenCalledWith('Referrer-Policy', 'no-referrer');
            expect(mockRes.setHeader).toHaveBeenCalledWith('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
            expect(mockNext).toHaveBeenCalled();
        });
    });

    describe("requireApiToken", () => {
        it("should let every request through when no token is configured", () => {
            requireApiToken(undefined)(mockReq as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledWith();
        });

        it("should accept the token from the request body", () => {
            mockReq.body = { message: 'hi', api_token: 'test-secret' };

            requireApiToken('test-secret')(mockReq as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledWith();
        });

        it("should accept the token from the x-api-key header", () => {
            headers['x-api-key'] = 'test-secret';

            requireApiToken('test-secret')(mockReq as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledWith();
        });

        it("should reject a wrong token", () => {
            mockReq.body = { message: 'hi', api_token: 'wrong-secret' };

            requireApiToken('test-secret')(mockReq as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledWith(expect.any(AuthenticationError));
        });

        it("should reject a request without a token", () => {
            requireApiToken('test-secret')(mockReq as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledWith(expect.any(AuthenticationError));
            expect(console.warn).toHaveBeenCalledWith('[Security] Rejected chat request from 127.0.0.1: invalid API token');
        });
    });

    describe("rateLimit", () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it("should allow requests within limit", () => {
            const limiter = rateLimit({ windowMs: 60_000, maxRequests: 3 });

            for (let i = 0; i < 3; i++) {
                limiter(mockReq as Request, mockRes as Response, mockNext);
            }

            expect(mockNext).toHaveBeenCalledTimes(3);
            expect(mockRes.status).not.toHaveBeenCalled();
        });

        it("should block requests exceeding limit", () => {
            const limiter = rateLimit({ windowMs: 60_000, maxRequests: 2 });

            for (let i = 0; i < 3; i++) {
                limiter(mockReq as Request, mockRes as Response, mockNext);
            }

            expect(mockNext).toHaveBeenCalledTimes(3);
            expect(mockNext).toHaveBeenLastCalledWith(expect.any(RateLimitError));
            expect(mockRes.set).toHaveBeenCalledWith('Retry-After', '60');
            expect(mockRes.status).not.toHaveBeenCalled();
        });

        it("should count clients separately", () => {
            const limiter = rateLimit({ windowMs: 60_000, maxRequests: 1 });

            limiter(mockReq as Request, mockRes as Response, mockNext);
            limiter({ ...mockReq, ip: '10.0.0.2' } as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledTimes(2);
        });

        it("should reset counter after time window", () => {
            const limiter = rateLimit({ windowMs: 60_000, maxRequests: 1 });

            limiter(mockReq as Request, mockRes as Response, mockNext);
            vi.advanceTimersByTime(60_001);
            limiter(mockReq as Request, mockRes as Response, mockNext);

            expect(mockNext).toHaveBeenCalledTimes(2);
        });
    });
});
