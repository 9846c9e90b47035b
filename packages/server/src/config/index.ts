import 'dotenv/config';

/**
 * Environment validation - exits if critical vars are missing
 */
function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    console.error(`FATAL: Missing required environment variable: ${name}`);
    process.exit(1);
  }
  return value;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  return value ? parseInt(value, 10) : defaultValue;
}

function optionalBool(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export const config = {
  // Server
  env: optionalEnv('NODE_ENV', 'development'),
  port: optionalNumber('PORT', 8000),
  apiPrefix: optionalEnv('API_PREFIX', '/api/v1'),
  corsOrigin: optionalEnv('CORS_ORIGIN', '*'),
  isProduction: process.env.NODE_ENV === 'production',
  isDevelopment: process.env.NODE_ENV === 'development',
  isTest: process.env.NODE_ENV === 'test',

  // Supabase
  supabase: {
    url: requireEnv('SUPABASE_URL'),
    serviceRoleKey: requireEnv('SUPABASE_SERVICE_ROLE_KEY'),
  },

  // Tokens
  auth: {
    secretKey: requireEnv('JWT_SECRET_KEY'),
    algorithm: 'HS256',
    accessTokenExpireMinutes: optionalNumber('ACCESS_TOKEN_EXPIRE_MINUTES', 30),
    refreshTokenExpireDays: optionalNumber('REFRESH_TOKEN_EXPIRE_DAYS', 7),
    bcryptRounds: optionalNumber('BCRYPT_ROUNDS', 12),
  },

  // Logging
  logging: {
    level: optionalEnv('LOG_LEVEL', 'info'),
    pretty: optionalBool('LOG_PRETTY', true),
  },
} as const;

export type Config = typeof config;
