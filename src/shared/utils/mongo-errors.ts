import { mongo } from 'mongoose';

const DUPLICATE_KEY_ERROR = 11000;

/** True for an E11000 raised by a unique index */
export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY_ERROR;
}
