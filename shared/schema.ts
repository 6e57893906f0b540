import {
  pgTable,
  text,
  serial,
  integer,
  boolean,
  timestamp,
  jsonb,
  varchar,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { createInsertSchema } from 'drizzle-zod';
import { z } from 'zod';

// Parsed records
export const legSchema = z.object({
  day: z.number().int().positive(),
  flightNumber: z.string(), // "000DH" for deadheads
  originalFlightNumber: z.string(),
  depStation: z.string().length(3),
  arrStation: z.string().length(3),
  depTime: z.string(), // HH:MM local
  arrTime: z.string(), // HH:MM local
  duration: z.string(), // Raw block token like "2h05" or "2:05"
  isDeadhead: z.boolean(),
});

export const layoverSchema = z.object({
  location: z.string(),
  duration: z.string(), // Raw token or "N/A"
});

export const tripSchema = z.object({
  tripNumber: z.string(),
  pairingNumber: z.string(),
  base: z.string().nullable(),
  originalText: z.string(),
  effectiveYear: z.number().int(),
  operatingDates: z.array(z.string()),

  tafb: z.string().optional(),
  tafbMinutes: z.number().int().optional(),
  creditTime: z.string().optional(),
  creditMinutes: z.number().int().optional(),
  correctedCredit: z.number(),
  creditTimePerDay: z.number(),
  perDiem: z.union([z.number(), z.string()]).optional(),
  correctedPerDiem: z.number(),

  days: z.record(z.string(), z.array(legSchema)),
  layovers: z.array(layoverSchema),
  hasDeadhead: z.boolean(),
  deadheadLegs: z.array(z.string()),
  startsOrEndsWithDeadhead: z.boolean(),
  startsWithDeadheadToReferenceStation: z.boolean(),

  longestLayover: z.number(),
  daysOfWork: z.number().int(),
  calendar: z.array(z.record(z.string(), z.string())),
  isRedeye: z.boolean(),
  isLazyPairing: z.boolean(),
  isWeekdayOnly: z.boolean(),
  isCommutable: z.boolean(),
  reportTime: z.string().optional(),
  releaseTime: z.string().optional(),
  isPrelim: z.boolean().optional(),
});

export type Leg = z.infer<typeof legSchema>;
export type Layover = z.infer<typeof layoverSchema>;
export type Trip = z.infer<typeof tripSchema>;

// Persistence
export const pairingDocuments = pgTable('pairing_documents', {
  id: serial('id').primaryKey(),
  fileName: text('file_name').notNull(),
  uploadedAt: timestamp('uploaded_at').defaultNow().notNull(),
  status: text('status').notNull().default('processing'), // processing, completed, failed
  tripCount: integer('trip_count').default(0).notNull(),
});

export const trips = pgTable(
  'trips',
  {
    id: serial('id').primaryKey(),
    documentId: integer('document_id')
      .notNull()
      .references(() => pairingDocuments.id, { onDelete: 'cascade' }),
    tripNumber: varchar('trip_number', { length: 32 }).notNull(),
    pairingNumber: varchar('pairing_number', { length: 32 }).notNull(),
    base: varchar('base', { length: 3 }),
    isPrelim: boolean('is_prelim').default(false).notNull(),
    daysOfWork: integer('days_of_work').default(0).notNull(),
    creditMinutes: integer('credit_minutes'),
    isRedeye: boolean('is_redeye').default(false).notNull(),
    isLazyPairing: boolean('is_lazy_pairing').default(false).notNull(),
    isWeekdayOnly: boolean('is_weekday_only').default(false).notNull(),
    isCommutable: boolean('is_commutable').default(false).notNull(),
    record: jsonb('record').$type<Trip>().notNull(), // Complete parsed trip
  },
  table => ({
    documentIdx: index('trips_document_idx').on(table.documentId),
  })
);

// Relations
export const pairingDocumentsRelations = relations(pairingDocuments, ({ many }) => ({
  trips: many(trips),
}));

export const tripsRelations = relations(trips, ({ one }) => ({
  document: one(pairingDocuments, {
    fields: [trips.documentId],
    references: [pairingDocuments.id],
  }),
}));

// Schemas
export const insertPairingDocumentSchema = createInsertSchema(pairingDocuments).omit({
  id: true,
  uploadedAt: true,
  status: true,
  tripCount: true,
});

export const tripFiltersSchema = z.object({
  base: z.string().length(3).toUpperCase().optional(),
  daysOfWork: z.coerce.number().int().nonnegative().optional(),
  redeye: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
  commutable: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
  lazy: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
  weekdayOnly: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
  prelim: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
});

// Types
export type PairingDocument = typeof pairingDocuments.$inferSelect;
export type InsertPairingDocument = z.infer<typeof insertPairingDocumentSchema>;
export type StoredTrip = typeof trips.$inferSelect;
export type InsertTrip = typeof trips.$inferInsert;
export type TripFilters = z.infer<typeof tripFiltersSchema>;
