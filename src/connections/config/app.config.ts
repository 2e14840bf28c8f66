import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_JWT_SECRET = 'secret';

const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseJwtAlgorithm = (value: string | undefined): JwtAlgorithm => {
  const normalized = (value || '').trim().toUpperCase();
  return JWT_ALGORITHMS.find(algorithm => algorithm === normalized) ?? 'HS256';
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

export const appConfig = {
  port: parseNumber(process.env.APP_PORT || process.env.PORT, 8000),
  nodeEnv: process.env.NODE_ENV || 'development',
  baseUrl: (process.env.BASE_URL || 'http://localhost:8000').replace(/\/+$/, ''),
  frontendUrl: (process.env.FRONTEND_URL || 'http://localhost:5173').replace(/\/+$/, ''),
  corsOrigins: parseCorsOrigins(),
};

export const authConfig = {
  jwtSecret: process.env.JWT_SECRET || DEFAULT_JWT_SECRET,
  jwtAlgorithm: parseJwtAlgorithm(process.env.JWT_ALGORITHM),
  accessTokenTtlSeconds: parseNumber(process.env.ACCESS_TOKEN_TTL_MINUTES, 30) * 60,
  refreshTokenTtlSeconds: parseNumber(process.env.REFRESH_TOKEN_TTL_DAYS, 7) * 24 * 3600,
  verificationTokenTtlSeconds: parseNumber(process.env.VERIFICATION_TOKEN_TTL_HOURS, 24) * 3600,
  resetPasswordTokenTtlSeconds: parseNumber(process.env.RESET_PASSWORD_TOKEN_TTL_HOURS, 1) * 3600,
  bcryptRounds: parseNumber(process.env.BCRYPT_ROUNDS, 10),
};

export const cacheConfig = {
  userTtlSeconds: parseNumber(process.env.CACHE_USER_TTL_SECONDS, 900),
  contactsTtlSeconds: parseNumber(process.env.CACHE_CONTACTS_TTL_SECONDS, 600),
};

export const emailConfig = {
  host: process.env.SMTP_HOST || 'smtp.gmail.com',
  port: parseNumber(process.env.SMTP_PORT, 465),
  secure: parseBoolean(process.env.SMTP_SECURE, true),
  user: process.env.SMTP_USER || '',
  pass: process.env.SMTP_PASS || '',
  from: process.env.MAIL_FROM || process.env.SMTP_USER || '',
  fromName: process.env.MAIL_FROM_NAME || 'Contacts API',
};

export const storageConfig = {
  type: (process.env.STORAGE_TYPE || 'local').toLowerCase(),
  uploadDir: process.env.UPLOAD_DIR || './uploads',
  maxAvatarSize: parseNumber(process.env.MAX_AVATAR_SIZE, 5 * 1024 * 1024),
  cloudflareAccountId: process.env.CLOUDFLARE_ACCOUNT_ID || '',
  cloudflareApiToken: process.env.CLOUDFLARE_API_TOKEN || '',
};

export const loggingConfig = {
  level: (process.env.LOG_LEVEL || (appConfig.nodeEnv === 'test' ? 'silent' : 'info')).toLowerCase(),
  dir: process.env.LOG_DIR || './logs',
};

/**
 * Fail fast on settings that must never reach production
 */
export const assertProductionConfig = (): void => {
  if (appConfig.nodeEnv !== 'production') return;

  if (authConfig.jwtSecret === DEFAULT_JWT_SECRET) {
    throw new Error('JWT_SECRET must be set in production');
  }
};
