import express from 'express';
import cors from 'cors';
import { isProduction } from './config/constants';
import { createCampaignsRouter } from './routes/campaigns.routes';
import { CampaignService } from './services/CampaignService';

export function createApp(service: CampaignService = new CampaignService()) {
  const app = express();

  const production = isProduction();
  const allowedOrigins = (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  const devLocalhostRegex = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin) {
        callback(null, true);
        return;
      }
      const isAllowed = allowedOrigins.includes(origin) || (!production && devLocalhostRegex.test(origin));
      if (!production) {
        console.log(`[cors] origin ${isAllowed ? 'allowed' : 'blocked'}: ${origin}`);
      }
      callback(null, isAllowed);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Identity'],
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      campaigns: service.listCampaigns().length,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createCampaignsRouter(service));

  return app;
}
