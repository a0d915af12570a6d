import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { DEFAULT_MAX_BYTES } from 'asset-minify-core';
import dotenv from 'dotenv';

import type { ApiConfig, CacheDriver } from './types/api.js';

let cachedConfig: ApiConfig | null = null;

const APP_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const REPO_ROOT = path.resolve(APP_ROOT, '..', '..');
const ROOT_ENV_PATH = path.join(REPO_ROOT, '.env');
const APP_LOCAL_ENV_PATH = path.join(APP_ROOT, '.env.local');
const APP_ENV_PATH = path.join(APP_ROOT, '.env');

const DEFAULT_PORT = 8787;

type Env = Record<string, string | undefined>;

function loadEnv() {
    const explicitPath = String(process.env.DOTENV_CONFIG_PATH ?? '').trim();
    if (explicitPath) {
        dotenv.config({ path: explicitPath, override: true });
        return;
    }

    const rootResult = dotenv.config({ path: ROOT_ENV_PATH, override: true });
    if (!rootResult.error) return;

    const localResult = dotenv.config({ path: APP_LOCAL_ENV_PATH, override: true });
    if (!localResult.error) return;

    dotenv.config({ path: APP_ENV_PATH, override: true });
}

function requireEnv(env: Env, name: string): string {
    const value = env[name]?.trim();
    if (!value) throw new Error(`Missing required env var: ${name}`);
    return value;
}

function readCacheDriver(env: Env): CacheDriver {
    const value = String(env.CACHE_DRIVER ?? 'file').trim().toLowerCase();
    if (value === 'file' || value === 'memory') {
        return value;
    }
    throw new Error('Invalid env var: CACHE_DRIVER (expected "file" or "memory")');
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`Invalid env var: ${name} (expected a positive integer, got "${raw}")`);
    }
    return value;
}

function readList(env: Env, name: string): string[] {
    return String(env[name] ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

export function readApiConfig(env: Env): ApiConfig {
    return {
        ASSET_MINIFY_ADMIN_KEY: requireEnv(env, 'ASSET_MINIFY_ADMIN_KEY'),
        CACHE_DRIVER: readCacheDriver(env),
        CACHE_DIR: env.CACHE_DIR?.trim() || path.join(os.tmpdir(), 'asset-minify-cache'),
        MINIFY_MAX_BYTES: readPositiveInt(env, 'MINIFY_MAX_BYTES', DEFAULT_MAX_BYTES),
        MINIFY_EXCLUDE: readList(env, 'MINIFY_EXCLUDE'),
        PORT: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    };
}

export function getApiConfig(): ApiConfig {
    if (cachedConfig) return cachedConfig;
    loadEnv();
    cachedConfig = readApiConfig(process.env);
    return cachedConfig;
}
