import type { Express, Request, Response } from 'express';
import { createServer, type Server } from 'http';
import multer from 'multer';
import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import {
  insertPairingDocumentSchema,
  tripFiltersSchema,
  type PairingDocument,
} from '../shared/schema';
import type { IStorage } from './storage';
import { PairingParser } from './pairingParser';
import { logger } from './logger';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 }, // 10MB
  fileFilter: (_req, file, cb) => {
    // Anything else is dropped and reported as a missing file
    cb(null, file.mimetype === 'text/plain' || file.originalname.toLowerCase().endsWith('.txt'));
  },
});

const referenceDateSchema = z
  .string()
  .refine(value => isValid(parseISO(value)), { message: 'Expected a yyyy-MM-dd date' })
  .transform(value => parseISO(value));

const parseRequestSchema = z.object({
  text: z.string().min(1),
  referenceDate: referenceDateSchema.optional(),
});

const uploadFieldsSchema = z.object({
  referenceDate: referenceDateSchema.optional(),
});

const documentIdSchema = z.coerce.number().int().positive();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function registerRoutes(
  app: Express,
  storage: IStorage,
  parser: PairingParser = new PairingParser()
): Promise<Server> {
  app.head('/api/health', (_req, res) => {
    res.status(200).end();
  });

  app.get('/api/health', async (_req, res) => {
    try {
      const health = await storage.getHealth();
      res.status(health.connected ? 200 : 503).json({
        status: health.connected ? 'ok' : 'error',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        database: health.connected ? 'connected' : 'disconnected',
        ...(health.error ? { error: health.error } : {}),
      });
    } catch (error) {
      res.status(503).json({
        status: 'error',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        database: 'disconnected',
        error: errorMessage(error),
      });
    }
  });

  // Parse raw text without storing anything
  app.post('/api/parse', (req, res) => {
    const body = parseRequestSchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ message: 'Invalid request', errors: body.error.errors });
    }

    try {
      const trips = parser.parse(body.data.text, body.data.referenceDate);
      res.json({ trips });
    } catch (error) {
      logger('error', `Error parsing text: ${errorMessage(error)}`, 'routes');
      res.status(500).json({ message: 'Failed to parse pairing text' });
    }
  });

  app.post('/api/documents/upload', upload.single('file'), async (req: Request, res: Response) => {
    if (!req.file) {
      return res.status(400).json({ message: 'No plain-text pairing file uploaded' });
    }

    const fields = uploadFieldsSchema.safeParse(req.body ?? {});
    if (!fields.success) {
      return res.status(400).json({ message: 'Invalid request', errors: fields.error.errors });
    }

    let document: PairingDocument;
    try {
      document = await storage.createDocument(
        insertPairingDocumentSchema.parse({ fileName: req.file.originalname })
      );
    } catch (error) {
      logger('error', `Error creating document: ${errorMessage(error)}`, 'routes');
      return res.status(500).json({ message: 'Failed to store pairing file' });
    }

    try {
      const trips = parser.parseBuffer(req.file.buffer, fields.data.referenceDate);
      await storage.createTrips(document.id, trips);
      await storage.updateDocumentStatus(document.id, 'completed', trips.length);

      logger('info', `Stored ${trips.length} pairings from ${document.fileName}`, 'routes');
      res.status(201).json({
        document: { ...document, status: 'completed', tripCount: trips.length },
        trips,
      });
    } catch (error) {
      logger('error', `Error processing ${document.fileName}: ${errorMessage(error)}`, 'routes');
      await storage.updateDocumentStatus(document.id, 'failed').catch(statusError => {
        logger('error', `Could not mark document ${document.id} failed: ${errorMessage(statusError)}`, 'routes');
      });
      res.status(500).json({ message: 'Failed to process pairing file' });
    }
  });

  app.get('/api/documents', async (_req, res) => {
    try {
      const documents = await storage.getDocuments();
      res.json(documents);
    } catch (error) {
      logger('error', `Error fetching documents: ${errorMessage(error)}`, 'routes');
      res.status(500).json({ message: 'Failed to fetch documents' });
    }
  });

  app.get('/api/documents/:id/trips', async (req, res) => {
    const id = documentIdSchema.safeParse(req.params.id);
    const filters = tripFiltersSchema.safeParse(req.query);
    if (!id.success || !filters.success) {
      return res.status(400).json({
        message: 'Invalid request',
        errors: [...(id.error?.errors ?? []), ...(filters.error?.errors ?? [])],
      });
    }

    try {
      const document = await storage.getDocument(id.data);
      if (!document) {
        return res.status(404).json({ message: 'Document not found' });
      }

      const trips = await storage.searchTrips(id.data, filters.data);
      res.json(trips.map(trip => ({ id: trip.id, ...trip.record })));
    } catch (error) {
      logger('error', `Error fetching trips: ${errorMessage(error)}`, 'routes');
      res.status(500).json({ message: 'Failed to fetch trips' });
    }
  });

  app.delete('/api/documents/:id', async (req, res) => {
    const id = documentIdSchema.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json({ message: 'Invalid document id' });
    }

    try {
      const document = await storage.getDocument(id.data);
      if (!document) {
        return res.status(404).json({ message: 'Document not found' });
      }

      await storage.deleteDocument(id.data);
      res.status(204).end();
    } catch (error) {
      logger('error', `Error deleting document: ${errorMessage(error)}`, 'routes');
      res.status(500).json({ message: 'Failed to delete document' });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
