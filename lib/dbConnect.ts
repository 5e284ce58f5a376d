import mongoose from 'mongoose';

type MongooseConnection = {
  conn: typeof mongoose | null;
  promise: Promise<typeof mongoose> | null;
};

declare global {
  // eslint-disable-next-line no-var
  var mongooseConnection: MongooseConnection | undefined;
}

// One connection per process, shared by every dbConnect() call until dbDisconnect()
const cached: MongooseConnection = global.mongooseConnection ?? { conn: null, promise: null };
global.mongooseConnection = cached;

async function dbConnect(uri: string | undefined = process.env.MONGODB_URI): Promise<typeof mongoose> {
  if (cached.conn) {
    return cached.conn;
  }

  if (!uri) {
    throw new Error('Please define the MONGODB_URI environment variable inside .env.local');
  }

  if (!cached.promise) {
    const opts = {
      bufferCommands: false,
    };

    cached.promise = mongoose.connect(uri, opts);
  }

  try {
    cached.conn = await cached.promise;
  } catch (e) {
    cached.promise = null;
    throw e;
  }

  return cached.conn;
}

export async function dbDisconnect(): Promise<void> {
  if (cached.conn) {
    await mongoose.disconnect();
  }
  cached.conn = null;
  cached.promise = null;
}

export default dbConnect;
