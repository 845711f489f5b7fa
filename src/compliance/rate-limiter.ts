/**
 * Simple in-memory per-host rate limiter.
 * Sufficient for a single-process deployment.
 */
const lastRequest = new Map<string, number>();

export async function acquireRateLimit(host: string, minDelayMs: number): Promise<void> {
  if (minDelayMs <= 0) return;

  const now = Date.now();
  const last = lastRequest.get(host) ?? 0;
  const elapsed = now - last;

  if (elapsed < minDelayMs) {
    const waitMs = minDelayMs - elapsed;
    await new Promise((resolve) => setTimeout(resolve, waitMs));
  }

  lastRequest.set(host, Date.now());
}
