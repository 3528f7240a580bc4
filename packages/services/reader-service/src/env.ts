// Imported first by main.ts so module-level loggers see values from .env
import { config } from 'dotenv';
import { resolve } from 'path';

config({ path: resolve(process.cwd(), '.env'), override: false });
