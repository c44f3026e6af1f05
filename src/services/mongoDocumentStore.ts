/**
 * MongoDB Document Store
 * Inserts go through the mongoose models (schema validation, defaults);
 * reads, guarded updates and the change stream use the native driver.
 */

import mongoose from 'mongoose';
import AlertImageModel from '../models/alertImageModel';
import AlertModel from '../models/alertModel';
import ProcessingResultModel from '../models/processingResultModel';
import ProcessingTaskModel from '../models/processingTaskModel';
import { ConflictError, ValidationError } from '../utils/appError';
import {
  KEY_FIELDS,
  WATCHED_COLLECTIONS,
  isCollectionName,
  type ChangeEvent,
  type ChangeFeed,
  type CollectionName,
  type DocumentStore,
  type FindOptions,
  type StoreDocument,
} from './documentStore';

type ChangeDocument = mongoose.mongo.ChangeStreamDocument<StoreDocument>;

interface CollectionBinding {
  native: mongoose.Collection;
  create: (document: StoreDocument) => Promise<unknown>;
}

const DUPLICATE_KEY = 11000;

function toStoreError(error: unknown, collection: CollectionName): unknown {
  if (error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY) {
    return new ConflictError(`Duplicate ${KEY_FIELDS[collection]} in ${collection}`);
  }
  if (error instanceof mongoose.Error.ValidationError) {
    return new ValidationError(`Invalid ${collection} document: ${error.message}`);
  }
  return error;
}

/**
 * Convert one driver change document. Returns null for operations the relay does not route.
 */
export function toChangeEvent(change: ChangeDocument): ChangeEvent | null {
  switch (change.operationType) {
    case 'insert':
    case 'replace': {
      if (!isCollectionName(change.ns.coll)) return null;
      return {
        operation: change.operationType,
        collection: change.ns.coll,
        documentKey: change.documentKey,
        fullDocument: change.fullDocument,
      };
    }
    case 'update': {
      if (!isCollectionName(change.ns.coll)) return null;
      return {
        operation: 'update',
        collection: change.ns.coll,
        documentKey: change.documentKey,
        ...(change.fullDocument ? { fullDocument: change.fullDocument } : {}),
        updatedFields: { ...change.updateDescription.updatedFields },
      };
    }
    default:
      return null;
  }
}

export class MongoDocumentStore implements DocumentStore {
  private readonly bindings: Record<CollectionName, CollectionBinding>;

  constructor(private readonly connection: mongoose.Connection = mongoose.connection) {
    this.bindings = {
      alerts: {
        native: AlertModel.collection,
        create: (document) => AlertModel.create(document),
      },
      alertImage: {
        native: AlertImageModel.collection,
        create: (document) => AlertImageModel.create(document),
      },
      processingTasks: {
        native: ProcessingTaskModel.collection,
        create: (document) => ProcessingTaskModel.create(document),
      },
      processingResults: {
        native: ProcessingResultModel.collection,
        create: (document) => ProcessingResultModel.create(document),
      },
    };
  }

  get connected(): boolean {
    return this.connection.readyState === mongoose.ConnectionStates.connected;
  }

  async insert(collection: CollectionName, document: StoreDocument): Promise<string> {
    try {
      await this.bindings[collection].create(document);
    } catch (error) {
      throw toStoreError(error, collection);
    }
    return String(document[KEY_FIELDS[collection]]);
  }

  async update(
    collection: CollectionName,
    id: string,
    patch: StoreDocument,
    guard: StoreDocument = {}
  ): Promise<boolean> {
    const filter = { ...guard, [KEY_FIELDS[collection]]: id };
    try {
      const result = await this.bindings[collection].native.updateOne(filter, { $set: patch });
      return result.matchedCount > 0;
    } catch (error) {
      throw toStoreError(error, collection);
    }
  }

  async find(collection: CollectionName, filter: StoreDocument, options: FindOptions = {}): Promise<StoreDocument[]> {
    let cursor = this.bindings[collection].native.find(filter);
    if (options.sort) cursor = cursor.sort(options.sort);
    if (options.limit !== undefined) cursor = cursor.limit(options.limit);
    return cursor.toArray();
  }

  findOne(collection: CollectionName, filter: StoreDocument): Promise<StoreDocument | null> {
    return this.bindings[collection].native.findOne(filter);
  }

  async remove(collection: CollectionName, id: string): Promise<boolean> {
    const result = await this.bindings[collection].native.deleteOne({ [KEY_FIELDS[collection]]: id });
    return result.deletedCount > 0;
  }

  /**
   * Database-level change stream over the relay's collections. Requires a replica set.
   */
  watch(): ChangeFeed {
    const stream = this.connection
      .getClient()
      .db(this.connection.name)
      .watch<StoreDocument, ChangeDocument>(
        [
          {
            $match: {
              'ns.coll': { $in: [...WATCHED_COLLECTIONS] },
              operationType: { $in: ['insert', 'update', 'replace'] },
            },
          },
        ],
        { fullDocument: 'updateLookup' }
      );

    return {
      async *[Symbol.asyncIterator]() {
        for await (const change of stream) {
          const event = toChangeEvent(change);
          if (event) yield event;
        }
      },
      close: () => stream.close(),
    };
  }
}
