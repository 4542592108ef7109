import type { Request, RequestHandler } from "express";

const DEFAULT_MAX_ENTRIES = 10_000;

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number };

interface AttemptWindow {
  attempts: number;
  closesAtMs: number;
}

export interface AttemptLimiterOptions {
  windowMs: number;
  maxAttempts: number;
  maxKeys?: number;
}

/**
 * Counts attempts per key in fixed windows held in process memory. Keys past `maxKeys` are
 * dropped oldest first.
 */
export class AttemptLimiter {
  private readonly windowMs: number;
  private readonly maxAttempts: number;
  private readonly maxKeys: number;
  private readonly windows = new Map<string, AttemptWindow>();

  constructor(options: AttemptLimiterOptions) {
    this.windowMs = options.windowMs;
    this.maxAttempts = options.maxAttempts;
    this.maxKeys = options.maxKeys ?? DEFAULT_MAX_ENTRIES;
  }

  get trackedKeys(): number {
    return this.windows.size;
  }

  attempt(key: string, now: Date): RateLimitDecision {
    const nowMs = now.getTime();
    this.dropClosedWindows(nowMs);

    const current = this.windows.get(key);
    if (!current) {
      this.windows.set(key, { attempts: 1, closesAtMs: nowMs + this.windowMs });
      this.dropOldestKeys();
      return { allowed: true, remaining: this.maxAttempts - 1 };
    }

    if (current.attempts >= this.maxAttempts) {
      return {
        allowed: false,
        retryAfterSeconds: Math.max(1, Math.ceil((current.closesAtMs - nowMs) / 1000))
      };
    }

    current.attempts += 1;
    return { allowed: true, remaining: this.maxAttempts - current.attempts };
  }

  private dropClosedWindows(nowMs: number): void {
    for (const [key, window] of this.windows) {
      if (window.closesAtMs <= nowMs) {
        this.windows.delete(key);
      }
    }
  }

  private dropOldestKeys(): void {
    for (const key of this.windows.keys()) {
      if (this.windows.size <= this.maxKeys) {
        return;
      }
      this.windows.delete(key);
    }
  }
}

/**
 * The peer address Express resolved for the request. Forwarded headers only count when the
 * `trust proxy` setting names the hop that sent them.
 */
export function clientIpFromRequest(request: Request): string {
  return request.ip || request.socket.remoteAddress || "unknown";
}

/** Rejects a request with 429 once its client has used up the window for `action`. */
export function limitAttemptsByClient(
  limiter: AttemptLimiter,
  options: { action: string; now: () => Date; message: string }
): RequestHandler {
  return (request, response, next) => {
    const decision = limiter.attempt(
      `${options.action}:${clientIpFromRequest(request)}`,
      options.now()
    );
    if (decision.allowed) {
      next();
      return;
    }

    response.setHeader("retry-after", String(decision.retryAfterSeconds));
    response.status(429).json({ code: "RATE_LIMITED", message: options.message });
  };
}
