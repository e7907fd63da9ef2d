/**
 * Health Check
 *
 * Liveness and readiness probes over named dependency checks.
 */
import { errorMessage } from '@tasktrack/core';

export interface CheckResult {
  status: 'pass' | 'warn' | 'fail';
  message?: string;
  duration?: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  checks: Record<string, CheckResult>;
  version?: string;
}

export interface Readiness {
  status: 'ready' | 'not_ready';
  checks: Record<string, CheckResult>;
}

export type HealthChecker = () => Promise<CheckResult>;

export class HealthCheck {
  private readonly checks = new Map<string, HealthChecker>();

  constructor(private readonly version?: string) {}

  register(name: string, checker: HealthChecker): this {
    this.checks.set(name, checker);
    return this;
  }

  /**
   * Run all health checks. A checker that throws counts as a failure.
   */
  async check(): Promise<HealthStatus> {
    const results: Record<string, CheckResult> = {};
    let hasFailure = false;
    let hasWarning = false;

    for (const [name, checker] of this.checks) {
      const start = performance.now();
      let result: CheckResult;
      try {
        result = await checker();
      } catch (err: unknown) {
        result = { status: 'fail', message: errorMessage(err) };
      }
      result.duration = Math.round((performance.now() - start) * 100) / 100;
      results[name] = result;

      if (result.status === 'fail') hasFailure = true;
      if (result.status === 'warn') hasWarning = true;
    }

    return {
      status: hasFailure ? 'unhealthy' : hasWarning ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      checks: results,
      ...(this.version !== undefined ? { version: this.version } : {}),
    };
  }

  liveness(): { status: 'ok' } {
    return { status: 'ok' };
  }

  /** Ready unless some check failed outright; warnings still serve traffic */
  async readiness(): Promise<Readiness> {
    const health = await this.check();
    return {
      status: health.status === 'unhealthy' ? 'not_ready' : 'ready',
      checks: health.checks,
    };
  }
}
