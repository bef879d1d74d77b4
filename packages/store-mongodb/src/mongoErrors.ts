import mongoose from 'mongoose';

const DUPLICATE_KEY = 11000;
/** IndexOptionsConflict, IndexKeySpecsConflict: an index with that name or key already exists. */
const INDEX_CONFLICTS = new Set([85, 86]);

function serverCode(error: unknown): number | undefined {
  if (!(error instanceof mongoose.mongo.MongoServerError)) return undefined;
  return typeof error.code === 'number' ? error.code : undefined;
}

export function isDuplicateKeyError(error: unknown): boolean {
  return serverCode(error) === DUPLICATE_KEY;
}

export function isIndexConflict(error: unknown): boolean {
  const code = serverCode(error);
  return code !== undefined && INDEX_CONFLICTS.has(code);
}

/** The server cannot be reached, or the connection is gone. */
export function isUnavailableError(error: unknown): boolean {
  return (
    error instanceof mongoose.mongo.MongoNetworkError ||
    error instanceof mongoose.mongo.MongoServerSelectionError ||
    error instanceof mongoose.mongo.MongoNotConnectedError ||
    error instanceof mongoose.mongo.MongoTopologyClosedError
  );
}
