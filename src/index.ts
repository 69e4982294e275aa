import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { createRideRoutes, toErrorReply } from './routes/rideRoutes';
import { hasFirebaseCredentials, loadEnvironmentConfig } from './config/config';
import {
  DriveDocument,
  DriveDocumentSchema,
  RiderDocument,
  RiderDocumentSchema
} from './models/types';
import { RideService } from './services/RideService';
import { DocumentStore } from './store/DocumentStore';
import { InMemoryDocumentStore } from './store/InMemoryDocumentStore';
import { FirestoreDocumentStore, createFirestore } from './store/FirestoreDocumentStore';
import { GeocodeProvider, GoogleMapsGeocoder, MockGeocoder } from './utils/geocoding';
import { ValidationError } from './utils/errors';

// Load environment variables
dotenv.config();

const app = express();
const envConfig = loadEnvironmentConfig();

// =============================================================================
// SERVICE SETUP
// Firestore and Google Maps when credentials are configured; otherwise an
// in-memory store and the mock geocoder for local development.
// =============================================================================

interface Stores {
  riders: DocumentStore<RiderDocument>;
  drives: DocumentStore<DriveDocument>;
}

function createStores(): Stores {
  if (hasFirebaseCredentials(envConfig)) {
    const db = createFirestore(envConfig);
    return {
      riders: new FirestoreDocumentStore(db, 'riders', RiderDocumentSchema),
      drives: new FirestoreDocumentStore(db, 'drives', DriveDocumentSchema)
    };
  }
  return {
    riders: new InMemoryDocumentStore<RiderDocument>(),
    drives: new InMemoryDocumentStore<DriveDocument>()
  };
}

const geocoder: GeocodeProvider = envConfig.googleMapsApiKey
  ? new GoogleMapsGeocoder(envConfig.googleMapsApiKey)
  : new MockGeocoder();

const rideService = new RideService({ ...createStores(), geocoder });

// =============================================================================
// MIDDLEWARE
// =============================================================================

// CORS configuration
app.use(cors({
  origin: envConfig.allowedOrigins,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  credentials: true
}));

// Body parsing
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true }));

// Request logging (development)
if (envConfig.nodeEnv === 'development') {
  app.use((req, res, next) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });
}

// =============================================================================
// ROUTES
// =============================================================================

// API routes
app.use('/api', createRideRoutes(rideService, {
  exposeErrors: envConfig.nodeEnv === 'development'
}));

// Root endpoint
app.get('/', (req, res) => {
  res.json({
    name: 'Carpool Matcher Service',
    version: '1.0.0',
    description: 'Fair, region-aware ride matching for volunteer carpools',
    endpoints: {
      health: 'GET /api/health',
      listDrives: 'GET /api/drives',
      createDrive: 'POST /api/drives',
      matchDrive: 'POST /api/drives/:id/match',
      editCapacity: 'PUT /api/drives/:id/capacity',
      listRiders: 'GET /api/riders',
      registerRider: 'POST /api/riders',
      importRiders: 'POST /api/riders/import',
      signup: 'POST /api/signup',
      regions: 'GET /api/regions',
      listConfigs: 'GET /api/config',
      getConfig: 'GET /api/config/:configId',
      updateConfig: 'PUT /api/config/:configId'
    }
  });
});

// =============================================================================
// ERROR HANDLING
// =============================================================================

// 404 handler
app.use((req, res) => {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Endpoint ${req.method} ${req.path} not found`
    }
  });
});

// Global error handler
app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
  // express.json() rejects a malformed body with a SyntaxError carrying the raw body
  if (err instanceof SyntaxError && 'body' in err) {
    const reply = toErrorReply(new ValidationError('Malformed JSON body'), false);
    res.status(reply.status).json(reply.body);
    return;
  }

  console.error('Unhandled error:', err);
  const reply = toErrorReply(err, envConfig.nodeEnv === 'development');
  res.status(reply.status).json(reply.body);
});

// =============================================================================
// START SERVER
// =============================================================================

const PORT = envConfig.port;

app.listen(PORT, () => {
  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║                   CARPOOL MATCHER SERVICE                     ║
╠═══════════════════════════════════════════════════════════════╣
║  Status:      Running                                         ║
║  Port:        ${PORT.toString().padEnd(47)}║
║  Environment: ${envConfig.nodeEnv.padEnd(47)}║
║  API Base:    http://localhost:${PORT}/api${' '.repeat(27)}║
╚═══════════════════════════════════════════════════════════════╝
  `);

  if (!envConfig.googleMapsApiKey) {
    console.warn('⚠️  WARNING: GOOGLE_MAPS_API_KEY not set. Using mock geocoder.');
  }
  if (!hasFirebaseCredentials(envConfig)) {
    console.warn('⚠️  WARNING: Firebase credentials not set. Data is kept in memory only.');
  }
});

export default app;
