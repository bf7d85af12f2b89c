// src/config/appConfig.ts
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const packageRoot = path.resolve(__dirname, '..', '..');

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5000),
    CORS_ORIGIN: z.string().default('*'),
    DATA_DIR: z.string().default(path.join(packageRoot, 'data')),
    UPLOADS_DIR: z.string().default(path.join(packageRoot, 'uploads')),
    LENDING_POLICY_PATH: z.string().default(path.join(packageRoot, 'config', 'lending.yaml')),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silent']).default('info')
});

export type AppConfig = {
    port: number;
    corsOrigin: string;
    dataDir: string;
    uploadsDir: string;
    lendingPolicyPath: string;
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);
    return {
        port: parsed.PORT,
        corsOrigin: parsed.CORS_ORIGIN,
        dataDir: parsed.DATA_DIR,
        uploadsDir: parsed.UPLOADS_DIR,
        lendingPolicyPath: parsed.LENDING_POLICY_PATH,
        logLevel: parsed.LOG_LEVEL
    };
}

export const appConfig = loadAppConfig();
