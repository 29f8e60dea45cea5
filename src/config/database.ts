import mongoose, { Connection } from "mongoose";
import { AppConfig } from "./env";

const clientOptions = {
  serverApi: {
    version: mongoose.mongo.ServerApiVersion.v1,
    strict: true,
    deprecationErrors: true,
  },
};

// Multi-document transactions need a replica set; a single-node one is
// enough for development (mongod --replSet rs0).
const connectDB = async ({ mongo }: AppConfig): Promise<Connection> => {
  try {
    const connection = mongoose.createConnection(mongo.uri, {
      ...clientOptions,
      dbName: mongo.dbName,
    });
    await connection.asPromise();

    console.log(`✅ MongoDB Connected Successfully`);
    console.log(`   Host: ${connection.host}`);
    console.log(`   Database: ${connection.name}`);

    return connection;
  } catch (error) {
    console.error("❌ MongoDB connection error:", error);
    console.error("   Please check MONGODB_URI in your .env file");
    console.error("   Format: mongodb://localhost:27017/?replicaSet=rs0");
    throw error;
  }
};

export default connectDB;
