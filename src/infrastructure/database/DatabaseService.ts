// Database Service - Main entry point for database operations
// Provides access to the repositories and handles initialization

import {
  getDatabase,
  closeDatabase,
  type DatabaseConfig,
  type DatabaseConnection,
  CampaignRepository,
} from './lowdb/index.js';

export class DatabaseService {
  // Repositories
  public readonly campaigns: CampaignRepository;

  private constructor(private db: DatabaseConnection) {
    this.campaigns = new CampaignRepository(db);
  }

  /**
   * Initialize the database
   */
  static async initialize(config: DatabaseConfig): Promise<DatabaseService> {
    const db = await getDatabase(config);
    if (!instance) {
      instance = new DatabaseService(db);
    }
    return instance;
  }

  /**
   * Close the database connection
   */
  static async close(): Promise<void> {
    await closeDatabase();
    instance = null;
  }

  /**
   * Get database statistics
   */
  getStats() {
    return {
      path: this.db.path,
      version: this.db.getVersion(),
      campaigns: this.campaigns.getStats(),
    };
  }
}

// Singleton instance
let instance: DatabaseService | null = null;

/**
 * Initialize database service with environment-based config
 */
export async function initDatabaseService(dbPath?: string): Promise<DatabaseService> {
  const config: DatabaseConfig = {
    path: dbPath || process.env.DB_PATH || './data/campaigns.json',
  };

  return DatabaseService.initialize(config);
}

export default DatabaseService;
