import dotenv from 'dotenv';

import { ConfigError } from './errors.js';
import { repoPath } from './io.js';

export interface OdooConfig {
  url: string;
  db: string;
  username: string;
  password: string;
  timeoutMs: number;
}

export interface SankhyaConfig {
  baseUrl: string;
  token: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
}

export interface SyncSettings {
  categoryAnchorName: string;
}

type Env = Record<string, string | undefined>;

export function envFilePath(): string {
  return repoPath('.env');
}

/** Loads `.env` from the working directory without overriding variables already set. */
export function loadEnvFile(): void {
  dotenv.config({ path: envFilePath() });
}

function readEnv(env: Env, name: string): string {
  return env[name]?.trim() ?? '';
}

function parseNumericEnv(value: string, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

function requireAll(env: Env, names: string[]): void {
  const missing = names.filter((name) => !readEnv(env, name));
  if (missing.length > 0) {
    throw new ConfigError(missing, envFilePath());
  }
}

export function loadOdooConfig(env: Env = process.env): OdooConfig {
  requireAll(env, ['ODOO_URL', 'ODOO_DB', 'ODOO_USER', 'ODOO_PASSWORD']);

  return {
    url: readEnv(env, 'ODOO_URL').replace(/\/+$/, ''),
    db: readEnv(env, 'ODOO_DB'),
    username: readEnv(env, 'ODOO_USER'),
    password: readEnv(env, 'ODOO_PASSWORD'),
    timeoutMs: parseNumericEnv(readEnv(env, 'ODOO_TIMEOUT_MS'), 30000)
  };
}

export function loadSankhyaConfig(env: Env = process.env): SankhyaConfig {
  requireAll(env, ['SANKHYA_TOKEN', 'SANKHYA_CLIENT_ID', 'SANKHYA_CLIENT_SECRET']);

  return {
    baseUrl: (readEnv(env, 'SANKHYA_BASE_URL') || 'https://api.sankhya.com.br').replace(/\/+$/, ''),
    token: readEnv(env, 'SANKHYA_TOKEN'),
    clientId: readEnv(env, 'SANKHYA_CLIENT_ID'),
    clientSecret: readEnv(env, 'SANKHYA_CLIENT_SECRET'),
    timeoutMs: parseNumericEnv(readEnv(env, 'SANKHYA_TIMEOUT_MS'), 60000)
  };
}

export function loadSyncSettings(env: Env = process.env): SyncSettings {
  return {
    categoryAnchorName: readEnv(env, 'CATEGORY_ANCHOR_NAME') || 'All'
  };
}
