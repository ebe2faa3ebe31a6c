import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config';
import { createPool } from './index';

const TAG = '[migrate]';

async function migrate(): Promise<void> {
    const pool = createPool(loadConfig());
    const sql = fs.readFileSync(path.join(__dirname, 'schema.sql'), 'utf8');

    try {
        await pool.query(sql);
        console.log(`${TAG} schema applied`);
    } finally {
        await pool.end();
    }
}

migrate().catch((err) => {
    console.error(`${TAG} failed:`, err);
    process.exit(1);
});
