import winston from 'winston'
import { env } from './env'

/**
 * Application logger
 *
 * - development: colourised single-line console output
 * - production: JSON lines with timestamps
 * - test: silent
 */

const developmentFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
    return `${timestamp} ${level}: ${message}${extra}`
  })
)

const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
)

export const logger = winston.createLogger({
  level: env.logLevel,
  format: env.nodeEnv === 'production' ? productionFormat : developmentFormat,
  transports: [new winston.transports.Console()],
  silent: env.nodeEnv === 'test',
})
