// MongoDB database connection and management
import mongoose from 'mongoose';
import { ENV } from '../config/environment.js';

class DatabaseManager {
  private isConnected = false;

  private get connectionString(): string {
    const { MONGODB_PROTOCOL, MONGODB_CLUSTER_HOST, MONGODB_NAME, MONGODB_USERNAME, MONGODB_PASSWORD } = ENV;

    if (MONGODB_USERNAME && MONGODB_PASSWORD) {
      return `${MONGODB_PROTOCOL}://${MONGODB_USERNAME}:${MONGODB_PASSWORD}@${MONGODB_CLUSTER_HOST}/${MONGODB_NAME}?authSource=admin`;
    }

    return `${MONGODB_PROTOCOL}://${MONGODB_CLUSTER_HOST}/${MONGODB_NAME}`;
  }

  async connect(): Promise<void> {
    if (this.isConnected) {
      console.log('✅ MongoDB already connected');
      return;
    }

    try {
      mongoose.set('strictQuery', true);
      mongoose.set('debug', ENV.NODE_ENV === 'development');

      await mongoose.connect(this.connectionString, {
        maxPoolSize: 10,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
        retryWrites: true,
        w: 'majority'
      });

      this.isConnected = true;
      console.log('✅ MongoDB connected successfully');
      console.log(`📍 Database: ${ENV.MONGODB_NAME}`);
      console.log(`🌐 Host: ${this.getConnectionString()}`);

      // Unique indexes back the one-review-per-author rule
      await mongoose.syncIndexes();

      mongoose.connection.on('error', (error) => {
        console.error('❌ MongoDB connection error:', error);
        this.isConnected = false;
      });

      mongoose.connection.on('disconnected', () => {
        console.log('⚠️ MongoDB disconnected');
        this.isConnected = false;
      });

      mongoose.connection.on('reconnected', () => {
        console.log('🔄 MongoDB reconnected');
        this.isConnected = true;
      });
    } catch (error) {
      console.error('❌ Failed to connect to MongoDB:', error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    try {
      await mongoose.disconnect();
      this.isConnected = false;
      console.log('✅ MongoDB disconnected successfully');
    } catch (error) {
      console.error('❌ Error disconnecting from MongoDB:', error);
      throw error;
    }
  }

  getConnectionStatus(): boolean {
    return this.isConnected;
  }

  getConnectionString(): string {
    return this.connectionString.replace(/\/\/.*@/, '//***:***@'); // Hide credentials in logs
  }
}

// Export singleton instance
export const databaseManager = new DatabaseManager();
