import { MongoClient, MongoServerError } from "mongodb";

export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  // Optional scene/job fields are left out of documents rather than stored as null.
  const client = new MongoClient(mongoUri, { ignoreUndefined: true });
  await client.connect();
  return client;
};

export const isDuplicateKeyError = (err: unknown): boolean => err instanceof MongoServerError && err.code === 11000;

/** Write conflicts between concurrent transactions; the same write can be retried. */
export const isWriteConflictError = (err: unknown): boolean =>
  err instanceof MongoServerError && (err.code === 112 || err.hasErrorLabel("TransientTransactionError"));
