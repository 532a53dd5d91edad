import { config } from 'dotenv';
import { resolve } from 'path';

config({ path: resolve(process.cwd(), '.env') });

export const IPC_DIR = process.env.IPC_DIR || '.';
export const STATUS_FILE = process.env.STATUS_FILE || 'voice_status.json';
