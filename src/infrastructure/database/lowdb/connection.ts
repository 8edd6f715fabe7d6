// LowDB connection and database instance management
// JSON file storage for campaign aggregates; `:memory:` keeps everything in process

import { Low, Memory } from 'lowdb';
import type { Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';

export const IN_MEMORY_PATH = ':memory:';

// Database schema definition with version field for optimistic locking
export interface DatabaseSchema {
  _version: number;           // File format version
  campaigns: CampaignRecord[];
}

/**
 * One campaign aggregate. Collections are JSON strings; only the repository
 * decodes them.
 */
export interface CampaignRecord {
  id: string;
  name: string;
  roster: string;                    // JSON Character[]
  active_combat: string | null;      // JSON CombatEncounter, null when no combat
  active_player_choices: string;     // JSON string[]
  read_aloud_text?: string | null;
  scene_image_uri?: string | null;
  narrative_log?: string;            // JSON LogEntry[], absent on older records
  recent_rolls?: string;             // JSON RollRecord[], newest first
  version: number;
  last_activity_at: string;
  created_at: string;
  updated_at: string;
}

function createDefaultData(): DatabaseSchema {
  return { _version: 1, campaigns: [] };
}

// Database configuration
export interface DatabaseConfig {
  path: string;
}

export class DatabaseConnection {
  private db: Low<DatabaseSchema>;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;

    let adapter: Adapter<DatabaseSchema>;
    if (config.path === IN_MEMORY_PATH) {
      adapter = new Memory<DatabaseSchema>();
    } else {
      mkdirSync(dirname(config.path), { recursive: true });
      adapter = new JSONFile<DatabaseSchema>(config.path);
    }
    this.db = new Low(adapter, createDefaultData());
  }

  get path(): string {
    return this.config.path;
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Files written by hand or by older seeds may miss fields
    if (this.db.data._version === undefined || !Array.isArray(this.db.data.campaigns)) {
      this.db.data = { ...createDefaultData(), ...this.db.data };
      if (!Array.isArray(this.db.data.campaigns)) this.db.data.campaigns = [];
      await this.db.write();
    }
  }

  getData(): DatabaseSchema {
    return this.db.data;
  }

  async write(): Promise<void> {
    await this.db.write();
  }

  getVersion(): number {
    return this.db.data._version;
  }

  async close(): Promise<void> {
    await this.write();
  }
}

// Singleton instance
let instance: DatabaseConnection | null = null;

export async function getDatabase(config?: DatabaseConfig): Promise<DatabaseConnection> {
  if (!instance) {
    if (!config) {
      throw new Error('Database config required for first initialization');
    }
    instance = new DatabaseConnection(config);
    await instance.init();
  }
  return instance;
}

export async function closeDatabase(): Promise<void> {
  if (instance) {
    await instance.close();
    instance = null;
  }
}

export async function initDatabase(config: DatabaseConfig): Promise<DatabaseConnection> {
  return getDatabase(config);
}
