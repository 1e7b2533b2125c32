import dotenv from 'dotenv'

dotenv.config()

/**
 * Environment configuration
 * Validates and exports all environment variables
 */

interface EnvConfig {
  nodeEnv: string
  port: number
  apiPrefix: string
  corsOrigin: string
  logLevel: string
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`)
  }
  return value
}

function getIntEnvVar(key: string, defaultValue: string): number {
  const raw = getEnvVar(key, defaultValue)
  const value = parseInt(raw, 10)
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`)
  }
  return value
}

export const env: EnvConfig = {
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
  port: getIntEnvVar('PORT', '3001'),
  apiPrefix: getEnvVar('API_PREFIX', '/api'),
  corsOrigin: getEnvVar('CORS_ORIGIN', 'http://localhost:3000'),
  logLevel: getEnvVar('LOG_LEVEL', 'info'),
}
