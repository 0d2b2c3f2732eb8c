import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import type { Services } from './services';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [...appConfig.corsOrigins];
    if (appConfig.nodeEnv === 'development') {
      allowedOrigins.push(...DEV_ORIGINS);
    }

    if (allowedOrigins.includes(origin)) {
      return callback(null, true);
    }

    // In development, allow all origins if CORS_ORIGINS is not set
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }
    return callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin'],
  maxAge: 86400, // 24 hours
};

export const createApp = (services: Services) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(express.json());

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await services.store.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected' });
    } catch {
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use('/api', createRoutes(services));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
