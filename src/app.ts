import express, { Application, Request, Response } from 'express';
import corsMiddleware from './middleware/cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requireAuth } from './middleware/auth';
import { loggers } from './utils/logger';

// Import routes
import authRoutes from './routes/auth';
import patientRoutes from './routes/patients';
import visitRoutes from './routes/visits';
import statsRoutes from './routes/stats';
import adminRoutes from './routes/admin';
import accountRoutes from './routes/accounts';

/**
 * Express Application Setup
 */

const app: Application = express();

// ===========================================
// Middleware
// ===========================================

// CORS
app.use(corsMiddleware);

// Body parsers
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Request logging middleware
app.use((req: Request, res: Response, next) => {
  const startTime = Date.now();

  // Log request
  loggers.httpRequest(req.method, req.path, req.ip);

  // Log response when finished
  res.on('finish', () => {
    const duration = Date.now() - startTime;
    loggers.httpResponse(req.method, req.path, res.statusCode, duration);
  });

  next();
});

// ===========================================
// Routes
// ===========================================

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

// API Routes
app.use('/api/auth', authRoutes);
app.use('/api/patients', requireAuth, patientRoutes);
app.use('/api/visits', requireAuth, visitRoutes);
app.use('/api/stats', requireAuth, statsRoutes);
app.use('/api/admin', requireAuth, adminRoutes);
app.use('/api/accounts', requireAuth, accountRoutes);

// ===========================================
// Error Handling
// ===========================================

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(errorHandler);

// ===========================================
// Exports
// ===========================================

export default app;
