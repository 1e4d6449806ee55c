import { config } from '../config.js';
import { database } from '../db.js';
import { PgRejectionStore } from './pg-rejection-store.js';

export const rejectionStore = new PgRejectionStore(database, config.schemas);
