import express from 'express';
import cors, { CorsOptions } from 'cors';
import { pool } from './connections';
import { appConfig } from './connections/config/app.config';
import routes from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

const app = express();

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // No origin header: curl, server-to-server
    if (!origin) {
      return callback(null, true);
    }

    if (appConfig.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    // Development without CORS_ORIGINS accepts everyone
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

app.use(cors(corsOptions));
app.use(express.json());

app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch {
    res.status(503).json({ status: 'error', database: 'disconnected' });
  }
});

app.use('/api', routes);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
