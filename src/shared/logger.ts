import winston from 'winston'

const { combine, timestamp, errors, json, colorize, printf } = winston.format

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
  return `${ts} ${level} ${message}${rest}`
})

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  format:
    process.env.NODE_ENV === 'production'
      ? combine(timestamp(), errors({ stack: true }), json())
      : combine(colorize(), timestamp(), errors({ stack: true }), devFormat),
  transports: [new winston.transports.Console()],
})

export default logger
