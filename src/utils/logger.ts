import winston from 'winston';
import { ExchangeError, PersistenceError } from './errors';

const sanitizeError = winston.format((info) => {
  const err = info instanceof Error ? info : info.error instanceof Error ? info.error : null;

  if (!err) return info;

  info.error = {
    name: err.name,
    message: err.message,
    stack: err.stack,
    ...(err instanceof ExchangeError && { operation: err.operation }),
    ...(err instanceof PersistenceError && { operation: err.operation }),
    ...(err.cause instanceof Error && { cause: err.cause.message }),
  };

  return info;
});

// Console output with colors
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  sanitizeError(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += `
${JSON.stringify(meta, null, 2)}`;
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  sanitizeError(),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: process.env.NODE_ENV === 'test',
  }),
];

if (process.env.NODE_ENV !== 'test') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: fileFormat,
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: fileFormat,
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'gap-liquidity-bot' },
  transports,
});

type Meta = Record<string, unknown>;

export const log = {
  info: (message: string, meta?: Meta) => logger.info(message, meta),
  warn: (message: string, meta?: Meta) => logger.warn(message, meta),
  error: (message: string, meta?: Meta) => logger.error(message, meta),
  debug: (message: string, meta?: Meta) => logger.debug(message, meta),

  // Trading events
  signal: (symbol: string, timeframe: string, direction: string, confidence: number) => {
    logger.info(`Signal: ${symbol} ${timeframe} ${direction}`, { symbol, timeframe, direction, confidence });
  },

  open: (symbol: string, side: string, price: number, quantity: number) => {
    logger.info(`Open: ${symbol} ${side} @ ${price} x ${quantity}`, {
      symbol, side, price, quantity, notional: price * quantity,
    });
  },

  close: (symbol: string, side: string, price: number, pnl: number) => {
    logger.info(`Close: ${symbol} ${side} @ ${price} | P&L ${pnl.toFixed(2)}`, {
      symbol, side, price, pnl,
    });
  },

  stopLoss: (symbol: string, side: string, price: number, pnl: number) => {
    logger.warn(`Stop-Loss: ${symbol} ${side} @ ${price} | P&L ${pnl.toFixed(2)}`, {
      symbol, side, price, pnl,
    });
  },
};

export default logger;
