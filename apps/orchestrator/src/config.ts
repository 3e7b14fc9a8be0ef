import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const config = {
  port: parseInt(process.env.PORT || '3001', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    path: process.env.DATABASE_PATH || join(__dirname, '../../data/deployments.sqlite'),
  },

  storage: {
    path: process.env.STORAGE_PATH || join(__dirname, '../../data/objects'),
    publicUrl: process.env.STORAGE_PUBLIC_URL || `http://localhost:${process.env.PORT || '3001'}/objects`,
    signingKey: process.env.STORAGE_SIGNING_KEY || '',
    // Appended to the object name in the Content-Disposition of uploads
    filenameSuffix: process.env.STORAGE_FILENAME_SUFFIX || undefined,
    linkExpireSeconds: parseInt(process.env.LINK_EXPIRE_SECONDS || '900', 10),
  },

  inventory: {
    path: process.env.INVENTORY_PATH || join(__dirname, '../../data/inventory.json'),
  },
};

export type Config = typeof config;
