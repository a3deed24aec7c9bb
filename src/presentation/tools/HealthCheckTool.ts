import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ResearchService } from '../../application/services/ResearchService.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { errorResult, textResult } from './formatters.js';

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: Record<string, unknown>;
}

/**
 * Snapshot of the engine's components. An open circuit or an unreadable
 * database marks the report degraded.
 */
export function buildHealthReport(
  researchService: ResearchService,
  dbConnection: DatabaseConnection,
  now: Date = new Date()
): HealthReport {
  const stats = researchService.getStatistics();
  const openCircuits = stats.circuits.filter((c) => c.state === 'open').map((c) => c.targetKey);

  const report: HealthReport = {
    timestamp: now.toISOString(),
    status: openCircuits.length > 0 ? 'degraded' : 'healthy',
    components: {
      jobs: stats.jobs,
      jobQueue: stats.queue,
      cache: stats.cache,
      rateLimits: stats.rateLimits,
      circuitBreaker: { openTargets: openCircuits, targets: stats.circuits },
      mergedEntities: stats.mergedEntities,
    },
  };

  try {
    const dbStats = dbConnection.getStatistics();
    report.components.database = {
      status: 'healthy',
      message: `Database connected - ${dbStats.totalJobs} jobs, ${dbStats.totalRecords} records, ${dbStats.totalEntities} entities`,
      statistics: dbStats,
    };
  } catch (error) {
    report.components.database = {
      status: 'error',
      message: error instanceof Error ? error.message : String(error),
    };
    report.status = 'degraded';
  }

  return report;
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  researchService: ResearchService,
  dbConnection: DatabaseConnection
) {
  server.tool(
    'health-check',
    'Check the health of the research engine (database, job queue, cache, rate limits, circuit breakers)',
    {},
    async () => {
      try {
        const health = buildHealthReport(researchService, dbConnection);
        return textResult(`# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``);
      } catch (error) {
        return errorResult('Health check error', error);
      }
    }
  );
}
