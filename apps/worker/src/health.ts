import type { Logger } from "@ragsync/logger";

export interface HealthCheckable {
  healthCheck(): Promise<boolean>;
}

/** Runs each dependency's health check once at start-up; failures are logged, not fatal. */
export async function checkDependencies(
  dependencies: Record<string, HealthCheckable>,
  logger: Logger,
): Promise<Record<string, boolean>> {
  const entries = await Promise.all(
    Object.entries(dependencies).map(async ([name, dependency]) => {
      const healthy = await dependency.healthCheck().catch((error: unknown) => {
        logger.warn({ dependency: name, err: error }, "Health check threw");
        return false;
      });
      if (healthy) {
        logger.info({ dependency: name }, "Dependency healthy");
      } else {
        logger.warn({ dependency: name }, "Dependency unhealthy");
      }
      return [name, healthy] as const;
    }),
  );
  return Object.fromEntries(entries);
}
