import { z } from 'zod';
import * as dotenv from 'dotenv';


// Load .env from repo root or current directory
import path from 'path';
dotenv.config({ path: path.resolve(__dirname, '../../../../.env') });
dotenv.config();

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.preprocess((val) => Number(val), z.number()).default(5000),
    CORS_ORIGIN: z.string().default('*'),
    GEMINI_API_KEY: z.string().optional(),
    GEMINI_MODEL_VISION: z.string().default('gemini-2.0-flash'),
    MAX_UPLOAD_BYTES: z.preprocess((val) => Number(val), z.number().int().positive()).default(16 * 1024 * 1024), // 16MB
    CATALOG_PATH: z.string().default(path.resolve(__dirname, '../../data/products.json')),
    RATE_LIMIT_MAX: z.preprocess((val) => Number(val), z.number().int().positive()).default(100),
});

const _env = envSchema.safeParse(process.env);

if (!_env.success) {
    console.error('❌ Invalid environment variables:', _env.error.format());
    process.exit(1);
}

export const env = _env.data;
