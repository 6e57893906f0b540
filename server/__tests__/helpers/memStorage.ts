import type {
  InsertPairingDocument,
  PairingDocument,
  StoredTrip,
  Trip,
  TripFilters,
} from '../../../shared/schema';
import type { DocumentStatus, IStorage, StorageHealth } from '../../storage';

/**
 * In-memory stand-in for DatabaseStorage
 */
export class MemStorage implements IStorage {
  private documents: PairingDocument[] = [];
  private trips: StoredTrip[] = [];
  private nextDocumentId = 1;
  private nextTripId = 1;

  async createDocument(document: InsertPairingDocument): Promise<PairingDocument> {
    const created: PairingDocument = {
      id: this.nextDocumentId++,
      fileName: document.fileName,
      uploadedAt: new Date(),
      status: 'processing',
      tripCount: 0,
    };
    this.documents.push(created);
    return created;
  }

  async getDocuments(): Promise<PairingDocument[]> {
    return [...this.documents].reverse();
  }

  async getDocument(id: number): Promise<PairingDocument | undefined> {
    return this.documents.find(document => document.id === id);
  }

  async updateDocumentStatus(id: number, status: DocumentStatus, tripCount?: number): Promise<void> {
    const document = this.documents.find(doc => doc.id === id);
    if (!document) return;
    document.status = status;
    if (tripCount !== undefined) document.tripCount = tripCount;
  }

  async deleteDocument(id: number): Promise<void> {
    this.documents = this.documents.filter(document => document.id !== id);
    this.trips = this.trips.filter(trip => trip.documentId !== id);
  }

  async createTrips(documentId: number, parsedTrips: Trip[]): Promise<StoredTrip[]> {
    const created = parsedTrips.map(trip => ({
      id: this.nextTripId++,
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
    }));
    this.trips.push(...created);
    return created;
  }

  async searchTrips(documentId: number, filters: TripFilters): Promise<StoredTrip[]> {
    return this.trips.filter(
      trip =>
        trip.documentId === documentId &&
        (filters.base === undefined || trip.base === filters.base) &&
        (filters.daysOfWork === undefined || trip.daysOfWork === filters.daysOfWork) &&
        (filters.redeye === undefined || trip.isRedeye === filters.redeye) &&
        (filters.commutable === undefined || trip.isCommutable === filters.commutable) &&
        (filters.lazy === undefined || trip.isLazyPairing === filters.lazy) &&
        (filters.weekdayOnly === undefined || trip.isWeekdayOnly === filters.weekdayOnly) &&
        (filters.prelim === undefined || trip.isPrelim === filters.prelim)
    );
  }

  async getHealth(): Promise<StorageHealth> {
    return { connected: true };
  }
}
