import {
  pairingDocuments,
  trips,
  type PairingDocument,
  type InsertPairingDocument,
  type StoredTrip,
  type InsertTrip,
  type Trip,
  type TripFilters,
} from '../shared/schema';
import { db, executeWithRetry, getDatabaseHealth } from './db';
import { and, asc, desc, eq, type SQL } from 'drizzle-orm';

export type DocumentStatus = 'processing' | 'completed' | 'failed';

export interface StorageHealth {
  connected: boolean;
  error?: string;
}

export interface IStorage {
  // Document operations
  createDocument(document: InsertPairingDocument): Promise<PairingDocument>;
  getDocuments(): Promise<PairingDocument[]>;
  getDocument(id: number): Promise<PairingDocument | undefined>;
  updateDocumentStatus(id: number, status: DocumentStatus, tripCount?: number): Promise<void>;
  deleteDocument(id: number): Promise<void>;

  // Trip operations
  createTrips(documentId: number, parsedTrips: Trip[]): Promise<StoredTrip[]>;
  searchTrips(documentId: number, filters: TripFilters): Promise<StoredTrip[]>;

  getHealth(): Promise<StorageHealth>;
}

export function toInsertTrip(documentId: number, trip: Trip): InsertTrip {
  return {
    documentId,
    tripNumber: trip.tripNumber,
    pairingNumber: trip.pairingNumber,
    base: trip.base,
    isPrelim: trip.isPrelim ?? false,
    daysOfWork: trip.daysOfWork,
    creditMinutes: trip.creditMinutes ?? null,
    isRedeye: trip.isRedeye,
    isLazyPairing: trip.isLazyPairing,
    isWeekdayOnly: trip.isWeekdayOnly,
    isCommutable: trip.isCommutable,
    record: trip,
  };
}

export class DatabaseStorage implements IStorage {
  async createDocument(document: InsertPairingDocument): Promise<PairingDocument> {
    const [created] = await executeWithRetry(
      () => db.insert(pairingDocuments).values(document).returning(),
      'createDocument'
    );
    return created;
  }

  async getDocuments(): Promise<PairingDocument[]> {
    return executeWithRetry(
      () => db.select().from(pairingDocuments).orderBy(desc(pairingDocuments.uploadedAt)),
      'getDocuments'
    );
  }

  async getDocument(id: number): Promise<PairingDocument | undefined> {
    const [document] = await executeWithRetry(
      () => db.select().from(pairingDocuments).where(eq(pairingDocuments.id, id)),
      'getDocument'
    );
    return document || undefined;
  }

  async updateDocumentStatus(id: number, status: DocumentStatus, tripCount?: number): Promise<void> {
    await executeWithRetry(
      () =>
        db
          .update(pairingDocuments)
          .set(tripCount === undefined ? { status } : { status, tripCount })
          .where(eq(pairingDocuments.id, id)),
      'updateDocumentStatus'
    );
  }

  async deleteDocument(id: number): Promise<void> {
    // Trips go with it through the cascading foreign key
    await executeWithRetry(
      () => db.delete(pairingDocuments).where(eq(pairingDocuments.id, id)),
      'deleteDocument'
    );
  }

  async createTrips(documentId: number, parsedTrips: Trip[]): Promise<StoredTrip[]> {
    if (parsedTrips.length === 0) return [];

    // Save in batches to keep statements small; one transaction so a failed
    // upload leaves no partial trip set behind
    const batchSize = 50;
    return executeWithRetry(
      () =>
        db.transaction(async tx => {
          const created: StoredTrip[] = [];
          for (let i = 0; i < parsedTrips.length; i += batchSize) {
            const batch = parsedTrips.slice(i, i + batchSize).map(trip => toInsertTrip(documentId, trip));
            const rows = await tx.insert(trips).values(batch).returning();
            created.push(...rows);
          }
          return created;
        }),
      'createTrips'
    );
  }

  async searchTrips(documentId: number, filters: TripFilters): Promise<StoredTrip[]> {
    const conditions: SQL[] = [eq(trips.documentId, documentId)];

    if (filters.base) conditions.push(eq(trips.base, filters.base));
    if (filters.daysOfWork !== undefined) conditions.push(eq(trips.daysOfWork, filters.daysOfWork));
    if (filters.redeye !== undefined) conditions.push(eq(trips.isRedeye, filters.redeye));
    if (filters.commutable !== undefined) conditions.push(eq(trips.isCommutable, filters.commutable));
    if (filters.lazy !== undefined) conditions.push(eq(trips.isLazyPairing, filters.lazy));
    if (filters.weekdayOnly !== undefined) conditions.push(eq(trips.isWeekdayOnly, filters.weekdayOnly));
    if (filters.prelim !== undefined) conditions.push(eq(trips.isPrelim, filters.prelim));

    return executeWithRetry(
      () =>
        db
          .select()
          .from(trips)
          .where(and(...conditions))
          .orderBy(asc(trips.id)),
      'searchTrips'
    );
  }

  async getHealth(): Promise<StorageHealth> {
    return getDatabaseHealth();
  }
}

export const storage = new DatabaseStorage();
