import {
  ImpersonationSession,
  RegularSession,
} from '../shared/interfaces/session-records.interface';

export interface StoredRecord {
  id: string;
}

/**
 * Returns the next version of the record. Returning the same object leaves
 * the stored record untouched; throwing aborts the update.
 */
export type RecordMutator<T> = (current: T) => T;

export interface RecordStore<T extends StoredRecord> {
  put(record: T): Promise<void>;
  get(id: string): Promise<T | null>;
  /** Newest first. */
  findByOwner(ownerId: string): Promise<T[]>;
  /**
   * Atomic read-modify-write of one record. Concurrent updates of the same id
   * are serialized, so each mutator sees the previous one's result.
   *
   * @throws NotFoundError when no record has this id.
   */
  update(id: string, mutator: RecordMutator<T>): Promise<T>;
}

export interface ImpersonationRecordStore
  extends RecordStore<ImpersonationSession> {
  /** Records still stored as `active` whose `expiresAt` is not after `now`. */
  findLapsed(now: Date): Promise<ImpersonationSession[]>;
}

/**
 * Persistence for the two session kinds. Used as the injection token; the
 * Postgres implementation is `DrizzleSessionStore`.
 */
export abstract class SessionStore {
  abstract readonly regular: RecordStore<RegularSession>;
  abstract readonly impersonation: ImpersonationRecordStore;
}
