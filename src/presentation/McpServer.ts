import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { DatabaseConnection, closeDatabase, initializeDatabase } from '../infrastructure/database/DatabaseConnection.js';
import { ResearchService, createResearchService } from '../application/services/ResearchService.js';
import { createLogger } from '../utils/logger.js';
import { registerResearchTools } from './tools/ResearchTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

const log = createLogger('McpServer');

/**
 * Main MCP Server class that wires the research engine to the stdio transport
 */
export class McpServer {
  private server: BaseMcpServer;
  private researchService: ResearchService;
  private dbConnection: DatabaseConnection;
  private shuttingDown = false;

  constructor(private config: Config) {
    this.dbConnection = initializeDatabase(config.database.path);
    this.researchService = createResearchService(config, this.dbConnection.getDatabase());

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    registerResearchTools(this.server, this.researchService);
    registerHealthCheckTool(this.server, this.researchService, this.dbConnection);
  }

  /**
   * Print database statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    log.info(
      `Database: ${stats.totalJobs} jobs, ${stats.totalRecords} records, ${stats.totalEntities} entities, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  /**
   * Recover jobs from the previous run, then connect stdio
   */
  async start() {
    log.debug(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);
    this.researchService.start();

    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      log.warn(`stdin error (non-fatal): ${error.message}`);
    });
    process.stdout.on('error', (error) => {
      log.warn(`stdout error (non-fatal): ${error.message}`);
    });
    process.stdin.on('end', () => {
      log.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    log.info(`${this.config.server.name} running on stdio`);
  }

  /**
   * Graceful shutdown: running jobs are cancelled and allowed to finalize
   * before the database closes.
   */
  async shutdown() {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    log.info('Shutting down gracefully...');

    await this.researchService.shutdown();
    await this.server.close();
    closeDatabase();
  }
}
