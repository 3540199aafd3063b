import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env from monorepo root (cwd is apps/worker/ when run through the workspace script)
config({ path: resolve(process.cwd(), '../../.env') });
