import express from 'express';
import cors from 'cors';
import { appConfig } from './connections/config/app.config';
import { RouteServices, createRoutes } from './routes';
import { UserResolver, createAuthMiddleware } from './middlewares/auth.middleware';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

export interface AppDependencies extends RouteServices {
  resolveUser: UserResolver;
  checkDatabase: () => Promise<void>;
}

// CORS Configuration
const corsOptions: cors.CorsOptions = {
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    // Allow requests with no origin (like mobile apps or curl requests)
    if (!origin) {
      return callback(null, true);
    }
    
    // Build allowed origins list
    const allowedOrigins: string[] = [];
    
    // Add frontend URL if exists
    if (appConfig.frontendUrl) {
      allowedOrigins.push(appConfig.frontendUrl);
    }
    
    // Add CORS origins from environment variable
    if (appConfig.corsOrigins.length > 0) {
      allowedOrigins.push(...appConfig.corsOrigins);
    }
    
    // Add default localhost origins for development
    if (appConfig.nodeEnv === 'development') {
      const defaultLocalhostOrigins = [
        'http://localhost:3000',
        'http://localhost:3001',
        'http://localhost:5173',
        'http://localhost:5174',
      ];
      defaultLocalhostOrigins.forEach(origin => {
        if (!allowedOrigins.includes(origin)) {
          allowedOrigins.push(origin);
        }
      });
    }
    
    // Check if origin is in allowed list
    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else {
      // In development, allow all origins if CORS_ORIGINS is not set
      if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: [
    'Content-Type',
    'Authorization',
    'X-Requested-With',
    'Accept',
    'Origin',
    'Access-Control-Request-Method',
    'Access-Control-Request-Headers',
  ],
  exposedHeaders: [
    'Content-Range',
    'X-Content-Range',
    'X-Total-Count',
  ],
  maxAge: 86400, // 24 hours
  optionsSuccessStatus: 200,
  preflightContinue: false,
};

export const createApp = (deps: AppDependencies) => {
  const app = express();

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await deps.checkDatabase();
      res.json({ status: 'ok', database: 'connected' });
    } catch {
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  // API Routes
  app.use('/api', createRoutes(deps, createAuthMiddleware(deps.resolveUser)));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
