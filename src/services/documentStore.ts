/**
 * Document store contract
 * The core only talks to persistence through this interface; MongoDocumentStore
 * implements it over mongoose, tests use an in-memory implementation
 */

export const COLLECTIONS = {
  alerts: 'alerts',
  alertImages: 'alertImage',
  processingTasks: 'processingTasks',
  processingResults: 'processingResults',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

export const WATCHED_COLLECTIONS: readonly CollectionName[] = Object.values(COLLECTIONS);

/** Natural key used by insert/update/remove for each collection */
export const KEY_FIELDS: Record<CollectionName, string> = {
  alerts: 'alert_id',
  alertImage: 'alert_image_id',
  processingTasks: 'task_id',
  processingResults: 'task_id',
};

export type StoreDocument = Record<string, unknown>;

export type SortSpec = Record<string, 1 | -1>;

export interface FindOptions {
  sort?: SortSpec;
  limit?: number;
}

export type ChangeOperation = 'insert' | 'update' | 'replace';

export interface ChangeEvent {
  operation: ChangeOperation;
  collection: CollectionName;
  documentKey: unknown;
  /** Present for inserts and replaces, and for updates when the store can look it up */
  fullDocument?: StoreDocument;
  /** Present for updates */
  updatedFields?: StoreDocument;
}

/**
 * A live, ordered stream of committed writes. Closing it releases the
 * underlying cursor and ends iteration.
 */
export interface ChangeFeed extends AsyncIterable<ChangeEvent> {
  close(): Promise<void>;
}

export interface DocumentStore {
  /** Insert a document and return its key */
  insert(collection: CollectionName, document: StoreDocument): Promise<string>;
  /**
   * Apply `patch` to the document with key `id`. When `guard` is given the update
   * only applies if the stored document still matches it.
   */
  update(
    collection: CollectionName,
    id: string,
    patch: StoreDocument,
    guard?: StoreDocument
  ): Promise<boolean>;
  find(collection: CollectionName, filter: StoreDocument, options?: FindOptions): Promise<StoreDocument[]>;
  findOne(collection: CollectionName, filter: StoreDocument): Promise<StoreDocument | null>;
  remove(collection: CollectionName, id: string): Promise<boolean>;
  watch(): ChangeFeed;
  readonly connected: boolean;
}

export function isCollectionName(value: string): value is CollectionName {
  return WATCHED_COLLECTIONS.some((name) => name === value);
}
