// LowDB repository exports

export { DatabaseConnection, getDatabase, closeDatabase, initDatabase, IN_MEMORY_PATH } from './connection.js';
export { CampaignRepository } from './CampaignRepository.js';

export type { CampaignRecord, DatabaseConfig, DatabaseSchema } from './connection.js';
