import { registerAs } from '@nestjs/config';
import { boolFromEnv } from './env.util';

export default registerAs('database', () => ({
  uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/resume-tailor',
  useInMemory: boolFromEnv('USE_IN_MEMORY_DB', false),
  /** JSON profile fixture loaded into the in-memory store at startup. */
  seedFile: process.env.PROFILE_SEED_FILE || '',
  options: {
    serverSelectionTimeoutMS: 30000,
    socketTimeoutMS: 45000,
    connectTimeoutMS: 30000,
    retryWrites: true,
    retryReads: true,
  },
}));
