/**
 * Health Check Endpoints
 *
 * Liveness, readiness and dependency health for container orchestration and
 * monitoring.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Router, Request, Response } from 'express';

/**
 * Health status enumeration
 */
export const HealthStatus = {
  HEALTHY: 'healthy',
  UNHEALTHY: 'unhealthy',
  DEGRADED: 'degraded',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  message?: string;
  lastChecked: string;
}

export interface HealthCheckResponse {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptime: number;
  dependencies: DependencyHealth[];
}

export interface LivenessResponse {
  alive: boolean;
  timestamp: string;
}

export interface ReadinessResponse {
  ready: boolean;
  timestamp: string;
  checks: Record<string, boolean>;
}

/**
 * A dependency the service relies on. A failing critical dependency makes
 * the service unhealthy and not ready; any other failure only degrades it.
 */
export interface DependencyChecker {
  name: string;
  critical: boolean;
  check(): Promise<DependencyHealth>;
}

/**
 * Result of a check function: a boolean, or a status with a message
 */
export type CheckResult = boolean | { status: HealthStatus; message?: string };

export function createDependencyChecker(
  name: string,
  runCheck: () => Promise<CheckResult>,
  options: { critical?: boolean } = {}
): DependencyChecker {
  const critical = options.critical ?? false;
  const failed = critical ? HealthStatus.UNHEALTHY : HealthStatus.DEGRADED;

  return {
    name,
    critical,
    async check(): Promise<DependencyHealth> {
      const startTime = Date.now();
      try {
        const result = await runCheck();
        const outcome: { status: HealthStatus; message?: string } =
          typeof result === 'boolean' ? { status: result ? HealthStatus.HEALTHY : failed } : result;
        return {
          name,
          status: outcome.status,
          message: outcome.message,
          latencyMs: Date.now() - startTime,
          lastChecked: new Date().toISOString(),
        };
      } catch (error) {
        return {
          name,
          status: failed,
          latencyMs: Date.now() - startTime,
          message: error instanceof Error ? error.message : 'Unknown error',
          lastChecked: new Date().toISOString(),
        };
      }
    },
  };
}

export interface HealthCheckConfig {
  version: string;
  dependencyCheckers: DependencyChecker[];
  startTime: Date;
}

export class HealthCheckService {
  private config: HealthCheckConfig;

  constructor(config: Partial<HealthCheckConfig> = {}) {
    this.config = {
      version: config.version ?? '1.0.0',
      dependencyCheckers: config.dependencyCheckers ?? [],
      startTime: config.startTime ?? new Date(),
    };
  }

  /**
   * Uptime in seconds
   */
  getUptime(): number {
    return Math.floor((Date.now() - this.config.startTime.getTime()) / 1000);
  }

  checkLiveness(): LivenessResponse {
    return {
      alive: true,
      timestamp: new Date().toISOString(),
    };
  }

  async checkReadiness(): Promise<ReadinessResponse> {
    const results = await this.checkDependencies();
    const checks: Record<string, boolean> = {};
    let ready = true;

    for (const checker of this.config.dependencyCheckers) {
      const result = results.find((r) => r.name === checker.name);
      const ok = result !== undefined && result.status !== HealthStatus.UNHEALTHY;
      checks[checker.name] = ok;
      if (checker.critical && !ok) {
        ready = false;
      }
    }

    return {
      ready,
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  async checkDependencies(): Promise<DependencyHealth[]> {
    return Promise.all(this.config.dependencyCheckers.map((checker) => checker.check()));
  }

  async checkHealth(): Promise<HealthCheckResponse> {
    const dependencies = await this.checkDependencies();

    let status: HealthStatus = HealthStatus.HEALTHY;
    if (dependencies.some((dep) => dep.status === HealthStatus.UNHEALTHY)) {
      status = HealthStatus.UNHEALTHY;
    } else if (dependencies.some((dep) => dep.status === HealthStatus.DEGRADED)) {
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      version: this.config.version,
      timestamp: new Date().toISOString(),
      uptime: this.getUptime(),
      dependencies,
    };
  }
}

/**
 * Mounts /health, /health/dependencies, /ready and /live
 */
export function createHealthRouter(config: Partial<HealthCheckConfig> = {}): Router {
  const router = Router();
  const healthService = new HealthCheckService(config);

  router.get('/health', (_req: Request, res: Response, next) => {
    healthService
      .checkHealth()
      .then((health) => {
        res.status(health.status === HealthStatus.UNHEALTHY ? 503 : 200).json(health);
      })
      .catch(next);
  });

  router.get('/health/dependencies', (_req: Request, res: Response, next) => {
    healthService
      .checkDependencies()
      .then((dependencies) => {
        res.json({ dependencies, timestamp: new Date().toISOString() });
      })
      .catch(next);
  });

  router.get('/ready', (_req: Request, res: Response, next) => {
    healthService
      .checkReadiness()
      .then((readiness) => {
        res.status(readiness.ready ? 200 : 503).json(readiness);
      })
      .catch(next);
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.json(healthService.checkLiveness());
  });

  return router;
}
