/**
 * Side-effect import: loads .env before any module reads process.env.
 * Entry points import this first so the logger sees LOG_LEVEL.
 */
import path from 'path';
import dotenv from 'dotenv';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });
