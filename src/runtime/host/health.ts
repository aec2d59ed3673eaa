import type { ComponentStatus } from "./types";
import { logger } from "../../logger";

export type HealthChecker = () => Promise<ComponentStatus>;
export type OverallHealth = ComponentStatus["status"];

export class HealthCheck {
  private checkers: Map<string, HealthChecker> = new Map();
  private results: Map<string, ComponentStatus> = new Map();
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  register(name: string, checker: HealthChecker): void {
    this.checkers.set(name, checker);
  }

  unregister(name: string): void {
    this.checkers.delete(name);
    this.results.delete(name);
  }

  async check(): Promise<ComponentStatus[]> {
    const names = [...this.checkers.keys()];
    const results = await Promise.all(names.map((name) => this.runChecker(name)));
    return results.filter((result): result is ComponentStatus => result !== null);
  }

  async checkOne(name: string): Promise<ComponentStatus | null> {
    return this.runChecker(name);
  }

  startLoop(intervalMs: number): void {
    if (this.intervalId) {
      return;
    }
    this.intervalId = setInterval(() => {
      void this.check();
    }, intervalMs);
  }

  stopLoop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  getResults(): ComponentStatus[] {
    return Array.from(this.results.values());
  }

  isHealthy(): boolean {
    return this.getOverallStatus() === "healthy";
  }

  getOverallStatus(): OverallHealth {
    const results = this.getResults();
    if (results.some((r) => r.status === "unhealthy")) {
      return "unhealthy";
    }
    if (results.some((r) => r.status === "degraded")) {
      return "degraded";
    }
    return "healthy";
  }

  private async runChecker(name: string): Promise<ComponentStatus | null> {
    const checker = this.checkers.get(name);
    if (!checker) {
      return null;
    }
    let result: ComponentStatus;
    try {
      result = await checker();
    } catch (error) {
      result = {
        name,
        status: "unhealthy",
        lastCheck: this.now(),
        details: {
          error: error instanceof Error ? error.message : String(error),
        },
      };
    }

    const previous = this.results.get(name);
    this.results.set(name, result);
    if (previous?.status !== result.status) {
      this.logTransition(name, previous?.status, result);
    }
    return result;
  }

  private logTransition(
    name: string,
    previous: OverallHealth | undefined,
    result: ComponentStatus,
  ): void {
    const fields = { component: name, from: previous ?? null, details: result.details };
    if (result.status === "healthy") {
      if (previous) {
        logger.info(fields, "Health check: component recovered");
      }
    } else if (result.status === "degraded") {
      logger.warn(fields, "Health check: component is degraded");
    } else {
      logger.error(fields, "Health check: component is unhealthy");
    }
  }
}
