import { describe, it, expect, vi } from "vitest";
import type { Response } from "express";
import {
  ValidationError,
  CommandSyntaxError,
  DateTimeParseError,
  AuthenticationError,
  ExternalServiceError,
  TimeoutError,
  RateLimitError,
  getErrorMessage,
  getErrorStatusCode,
  handleRouteError,
  classifyPipelineError,
} from "../utils/errorHandler";
import { withTimeout } from "../utils/timeout";
import { z } from "zod";

function createMockResponse() {
  const mockRes = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn(),
  };
  return { mockRes, res: mockRes as unknown as Response };
}

describe("Error Classes", () => {
  it("ValidationError has 400 status code", () => {
    const error = new ValidationError("Invalid input");
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("Invalid input");
    expect(error.name).toBe("ValidationError");
    expect(error.isOperational).toBe(true);
  });

  it("CommandSyntaxError is a ValidationError that ends with the usage", () => {
    const error = new CommandSyntaxError("Invalid event syntax.", "event: Title | start | end");
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("Invalid event syntax. Use: event: Title | start | end");
    expect(error.usage).toBe("event: Title | start | end");
  });

  it("DateTimeParseError names the value and the accepted formats", () => {
    const error = new DateTimeParseError("tomorrow", ["YYYY-MM-DD", "YYYY-MM-DD HH:MM"]);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("Could not parse datetime from 'tomorrow'. Accepted formats: YYYY-MM-DD, YYYY-MM-DD HH:MM.");
    expect(error.value).toBe("tomorrow");
  });

  it("AuthenticationError has 401 status code", () => {
    const error = new AuthenticationError();
    expect(error.statusCode).toBe(401);
    expect(error.message).toBe("Authentication required");
  });

  it("AuthenticationError accepts custom message", () => {
    const error = new AuthenticationError("Invalid token");
    expect(error.message).toBe("Invalid token");
  });

  it("ExternalServiceError has 502 status code", () => {
    const cause = new Error("ECONNREFUSED");
    const error = new ExternalServiceError("LLM", "connection refused", { cause });
    expect(error.statusCode).toBe(502);
    expect(error.message).toBe("LLM error: connection refused");
    expect(error.service).toBe("LLM");
    expect(error.cause).toBe(cause);
  });

  it("TimeoutError has 504 status code", () => {
    const error = new TimeoutError("Calendar event creation", 30000);
    expect(error.statusCode).toBe(504);
    expect(error.message).toBe("Calendar event creation timed out after 30000ms");
  });

  it("RateLimitError has 429 status code", () => {
    const error = new RateLimitError();
    expect(error.statusCode).toBe(429);
    expect(error.message).toBe("Rate limit exceeded");
  });
});

describe("getErrorMessage", () => {
  it("extracts message from ZodError", () => {
    const result = z.object({ name: z.string() }).safeParse({ name: 123 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(getErrorMessage(result.error)).toContain("Expected string, received number");
    }
  });

  it("extracts message from standard Error", () => {
    const error = new Error("Something went wrong");
    expect(getErrorMessage(error)).toBe("Something went wrong");
  });

  it("returns default message for unknown error types", () => {
    expect(getErrorMessage("string error")).toBe("An unexpected error occurred");
    expect(getErrorMessage(null)).toBe("An unexpected error occurred");
    expect(getErrorMessage(undefined)).toBe("An unexpected error occurred");
    expect(getErrorMessage(42)).toBe("An unexpected error occurred");
  });
});

describe("getErrorStatusCode", () => {
  it("returns 400 for ZodError", () => {
    const result = z.object({ name: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(getErrorStatusCode(result.error)).toBe(400);
    }
  });

  it("returns custom statusCode from AppError", () => {
    expect(getErrorStatusCode(new AuthenticationError())).toBe(401);
    expect(getErrorStatusCode(new ValidationError("X"))).toBe(400);
    expect(getErrorStatusCode(new RateLimitError())).toBe(429);
    expect(getErrorStatusCode(new TimeoutError("X", 1))).toBe(504);
  });

  it("returns 500 for standard Error", () => {
    expect(getErrorStatusCode(new Error("oops"))).toBe(500);
  });

  it("returns 500 for unknown types", () => {
    expect(getErrorStatusCode("string")).toBe(500);
    expect(getErrorStatusCode(null)).toBe(500);
  });
});

describe("handleRouteError", () => {
  it("sends correct status and message for RateLimitError", () => {
    const { mockRes, res } = createMockResponse();

    handleRouteError(res, new RateLimitError("Too many requests"), "test");

    expect(mockRes.status).toHaveBeenCalledWith(429);
    expect(mockRes.json).toHaveBeenCalledWith({ error: "Too many requests" });
  });

  it("sends 400 with the corrective message for command syntax errors", () => {
    const { mockRes, res } = createMockResponse();

    handleRouteError(res, new CommandSyntaxError("Invalid event syntax.", "event: A | B | C"), "test", { userFacing: true });

    expect(mockRes.status).toHaveBeenCalledWith(400);
    expect(mockRes.json).toHaveBeenCalledWith({ error: "Invalid event syntax. Use: event: A | B | C" });
  });

  it("sends 500 for standard Error", () => {
    const { mockRes, res } = createMockResponse();
    vi.spyOn(console, "error").mockImplementation(() => {});

    handleRouteError(res, new Error("Internal"), "test");

    expect(mockRes.status).toHaveBeenCalledWith(500);
    expect(mockRes.json).toHaveBeenCalledWith({ error: "Internal" });
    vi.restoreAllMocks();
  });

  it("replaces 5xx messages with the user-facing one when asked", () => {
    const { mockRes, res } = createMockResponse();
    vi.spyOn(console, "error").mockImplementation(() => {});

    handleRouteError(res, new ExternalServiceError("LLM", "connect ECONNREFUSED"), "Chat", { userFacing: true });

    expect(mockRes.status).toHaveBeenCalledWith(502);
    expect(mockRes.json).toHaveBeenCalledWith({
      error: "I can't process this right now: the LLM service is unavailable.",
    });
    vi.restoreAllMocks();
  });

  it("logs errors for 500+ status codes when context provided", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { res } = createMockResponse();

    handleRouteError(res, new Error("Server error"), "TestContext");

    expect(consoleSpy).toHaveBeenCalledWith(expect.stringMatching(/^\[ERROR\] \[TestContext\] Server error /));
    consoleSpy.mockRestore();
  });

  it("does not log for client errors", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { res } = createMockResponse();

    handleRouteError(res, new AuthenticationError("Invalid API token"), "TestContext");

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });
});

describe("classifyPipelineError", () => {
  it("classifies timeouts", () => {
    expect(classifyPipelineError(new TimeoutError("LLM completion", 5)).type).toBe("timeout");
  });

  it("classifies quota failures by code", () => {
    const error = Object.assign(new Error("You exceeded your current quota"), { code: "insufficient_quota" });
    const classified = classifyPipelineError(error);
    expect(classified.type).toBe("llm_quota");
    expect(classified.errorCode).toBe("insufficient_quota");
  });

  it("classifies an unreachable collaborator as unavailable", () => {
    const classified = classifyPipelineError(new ExternalServiceError("Google Calendar", "socket hang up"));
    expect(classified.type).toBe("service_unavailable");
    expect(classified.userMessage).toBe("I can't process this right now: the Google Calendar service is unavailable.");
  });

  it("falls back to internal", () => {
    expect(classifyPipelineError("boom").type).toBe("internal");
  });
});

describe("withTimeout", () => {
  it("resolves with the value when the call settles in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 1000, "Fast call")).resolves.toBe("done");
  });

  it("rejects with TimeoutError when the bound is exceeded", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => {}), 50, "Slow call");
    const assertion = expect(pending).rejects.toThrow("Slow call timed out after 50ms");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    vi.useRealTimers();
  });
});
