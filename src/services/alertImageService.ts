import { randomUUID } from 'node:crypto';
import { NotFoundError } from '../utils/appError';
import { AlertImageInputSchema, AlertImageRecordSchema, parseWith } from '../types/schemas';
import type { AlertImage } from '../types';
import { COLLECTIONS, type DocumentStore, type StoreDocument } from './documentStore';

export interface AlertImageServiceOptions {
  store: DocumentStore;
  now?: () => Date;
  generateId?: () => string;
}

export class AlertImageService {
  private readonly store: DocumentStore;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: AlertImageServiceOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async create(input: unknown): Promise<AlertImage> {
    const data = parseWith(AlertImageInputSchema, input, 'alert image');

    const image: AlertImage = {
      alert_image_id: data.alert_image_id ?? this.generateId(),
      found: data.found,
      name: data.name,
      drone_id: data.drone_id,
      actual_image: data.actual_image,
      matched_frame: data.matched_frame,
      location: data.location,
      timestamp: data.timestamp ?? this.now(),
    };

    await this.store.insert(COLLECTIONS.alertImages, { ...image });
    console.log(`[AlertImages] Alert image ${image.alert_image_id} (${image.name}) stored`);
    return image;
  }

  async get(alertImageId: string): Promise<AlertImage> {
    const document = await this.store.findOne(COLLECTIONS.alertImages, { alert_image_id: alertImageId });
    if (!document) {
      throw new NotFoundError(`Could not find alert image with ID: ${alertImageId}`);
    }
    return parseWith(AlertImageRecordSchema, document, `stored alert image ${alertImageId}`);
  }

  list(limit: number): Promise<StoreDocument[]> {
    return this.store.find(COLLECTIONS.alertImages, {}, { sort: { timestamp: -1 }, limit });
  }

  async remove(alertImageId: string): Promise<void> {
    const removed = await this.store.remove(COLLECTIONS.alertImages, alertImageId);
    if (!removed) {
      throw new NotFoundError(`Could not find alert image with ID: ${alertImageId}`);
    }
  }
}
