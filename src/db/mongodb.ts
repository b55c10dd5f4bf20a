import { MongoClient, Db, Collection, Document } from "mongodb";
import { config } from "../config";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";

export const COLLECTIONS = {
  clients: "clients",
  campaigns: "campaigns",
  results: "campaign_results",
} as const;

/**
 * MongoDB Connection Service
 *
 * Holds clients, campaigns and final campaign results. Orchestration state
 * (trackers, rounds) never touches the database.
 *
 * Strategy:
 * - Single connection instance (connection pooling)
 * - Lazy connection (connect on first use)
 * - Auto-reconnect on failure
 * - Graceful shutdown
 */
class MongoDBService {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private connectionString: string;
  private dbName: string;
  private isConnecting: boolean = false;
  private connectionPromise: Promise<void> | null = null;

  constructor() {
    this.connectionString = config.mongodb.connectionString;
    this.dbName = config.mongodb.databaseName;
  }

  get isConfigured(): boolean {
    return this.connectionString.length > 0;
  }

  /**
   * Get database connection (lazy initialization)
   */
  async getDb(): Promise<Db> {
    if (this.db) {
      return this.db;
    }

    if (this.isConnecting && this.connectionPromise) {
      await this.connectionPromise;
      if (this.db) return this.db;
    }

    await this.connect();

    if (!this.db) {
      throw new Error("Failed to establish MongoDB connection");
    }

    return this.db;
  }

  /**
   * Connect to MongoDB
   */
  private async connect(): Promise<void> {
    if (this.isConnecting) {
      return this.connectionPromise || Promise.resolve();
    }

    this.isConnecting = true;
    this.connectionPromise = this._connect();

    try {
      await this.connectionPromise;
    } finally {
      this.isConnecting = false;
      this.connectionPromise = null;
    }
  }

  private async _connect(): Promise<void> {
    try {
      if (!this.connectionString) {
        throw new Error("MongoDB connection string not configured");
      }

      logger.info("Connecting to MongoDB...");

      this.client = new MongoClient(this.connectionString, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
        retryWrites: true,
        retryReads: true,
      });

      await this.client.connect();
      this.db = this.client.db(this.dbName);

      // Test connection
      await this.db.command({ ping: 1 });

      logger.info("MongoDB connected successfully", {
        database: this.dbName,
      });

      // Create indexes on first connection
      await this.createIndexes();

    } catch (error) {
      logger.error("Failed to connect to MongoDB", {
        error: errorMessage(error),
      });

      this.client = null;
      this.db = null;

      throw error;
    }
  }

  /**
   * Create indexes for efficient queries
   */
  private async createIndexes(): Promise<void> {
    try {
      if (!this.db) return;

      logger.info("Creating MongoDB indexes...");

      const campaigns = this.db.collection(COLLECTIONS.campaigns);
      await campaigns.createIndex({ id: 1 }, { unique: true });
      await campaigns.createIndex({ client_id: 1, created_at: -1 });

      const clients = this.db.collection(COLLECTIONS.clients);
      await clients.createIndex({ id: 1 }, { unique: true });

      const results = this.db.collection(COLLECTIONS.results);
      await results.createIndex({ campaign_id: 1, finished_at: -1 });
      await results.createIndex({ run_id: 1 }, { unique: true });

      logger.info("MongoDB indexes created successfully");

    } catch (error) {
      logger.error("Failed to create MongoDB indexes", {
        error: errorMessage(error),
      });
      // Don't throw - indexes are optimization, not critical
    }
  }

  /**
   * Get a collection
   */
  async getCollection<T extends Document = Document>(name: string): Promise<Collection<T>> {
    const db = await this.getDb();
    return db.collection<T>(name);
  }

  /**
   * Check if MongoDB is connected and healthy
   */
  async isHealthy(): Promise<boolean> {
    try {
      if (!this.db) return false;

      await this.db.command({ ping: 1 });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Gracefully close MongoDB connection
   */
  async close(): Promise<void> {
    try {
      if (this.client) {
        logger.info("Closing MongoDB connection...");
        await this.client.close();
        this.client = null;
        this.db = null;
        logger.info("MongoDB connection closed");
      }
    } catch (error) {
      logger.error("Error closing MongoDB connection", {
        error: errorMessage(error),
      });
    }
  }
}

// Export singleton instance
export const mongoDBService = new MongoDBService();
