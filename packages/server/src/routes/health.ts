import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"
import type { Application } from "../server/server"

const NO_STORE = { "Cache-Control": "no-store" } as const

type CheckResult = { ok: true } | { ok: false; reason: string }

/**
 * Liveness always answers 200. Readiness answers 503 until the server is ready,
 * then runs each check in order and reports the first one that fails.
 */
export function registerHealthRoutes(
  app: Application,
  config: Extract<ResolvedHealthConfig, { enabled: true }>,
  isReady: () => boolean,
): void {
  app.get(config.livenessPath, (c) => c.json({ ok: true }, 200, NO_STORE))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json({ ok: false, reason: "starting" }, 503, NO_STORE)
    }

    for (const check of config.readinessChecks) {
      const result = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!result.ok) return c.json(result, 503, NO_STORE)
    }

    return c.json({ ok: true }, 200, NO_STORE)
  })
}

async function runCheck(check: ReadinessCheck, timeoutMs: number): Promise<CheckResult> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  const failed = (suffix?: string): CheckResult => ({
    ok: false,
    reason: controller.signal.aborted
      ? `${check.name}:timeout`
      : suffix
        ? `${check.name}:${suffix}`
        : check.name,
  })

  try {
    const healthy = await check.fn(controller.signal)

    return healthy && !controller.signal.aborted ? { ok: true } : failed()
  } catch {
    return failed("error")
  } finally {
    clearTimeout(timer)
  }
}
