// src/server.ts
import express from 'express';
import cors from 'cors';
import { Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { z, ZodError } from 'zod';
import logger, { log } from './utils/logger';
import { assertRuntimeEnv, config } from './config';
import { parseStrategyParameters, strategyInputSchema, toStrategyInput } from './config/strategy';
import { TradingBot } from './core/TradingBot';
import { SignalObserver } from './monitoring/SignalBus';
import { StrategyParameters } from './types';
import { ConfigurationError, ExchangeError, NotFoundError, PersistenceError, errorMessage } from './utils/errors';

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
const route = (handler: AsyncHandler): express.RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

const watchSchema = z.object({
  symbol: z.string().min(3),
  exchange: z.string().optional(),
  timeframes: z.array(z.string().min(1)).optional(),
});

const strategyConfigSchema = z.object({
  exchange: z.string().default(config.exchange.name),
  symbol: z.string().min(3),
  parameters: strategyInputSchema,
});

const startStrategySchema = z.object({
  exchange: z.string().default(config.exchange.name),
  symbol: z.string().min(3),
  parameters: strategyInputSchema.optional(),
});

const symbolSchema = z.object({
  symbol: z.string().min(3),
});

const stopLossSchema = z.object({
  stopLossPrice: z.number().positive(),
});

const executeSignalSchema = z.object({
  symbol: z.string().min(3),
  timeframe: z.string().min(1),
});

const positionsQuerySchema = z.object({
  status: z.enum(['open', 'closed']).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

const tradesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
  exchange: z.string().optional(),
  symbol: z.string().optional(),
  action: z.enum(['open', 'close', 'stop_loss']).optional(),
});

const idParamSchema = z.coerce.number().int().positive();

export function createApp(bot: TradingBot): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.get('/', (req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.get('/api/health', route(async (req, res) => {
    const storeHealthy = await bot.store.healthCheck();
    res.status(storeHealthy ? 200 : 503).json({
      uptime: process.uptime(),
      timestamp: Date.now(),
      status: storeHealthy ? 'ok' : 'degraded',
      running: bot.isRunning,
      scanner: bot.scanner.isRunning,
    });
  }));

  // ---------- Signals & watchlist ----------

  app.get('/api/signals', (req, res) => {
    const symbol = typeof req.query.symbol === 'string' ? req.query.symbol : undefined;
    res.json({
      success: true,
      data: symbol ? bot.scanner.latestSignal(symbol) : bot.scanner.latestSignal(),
    });
  });

  app.post('/api/signals/execute', route(async (req, res) => {
    const { symbol, timeframe } = executeSignalSchema.parse(req.body);
    const position = await bot.executeSignal(symbol, timeframe);
    res.status(position ? 201 : 200).json({ success: true, data: position });
  }));

  app.get('/api/watchlist', (req, res) => {
    res.json({ success: true, data: bot.scanner.listWatched() });
  });

  app.post('/api/watchlist', (req, res) => {
    const body = watchSchema.parse(req.body);
    if (body.exchange) bot.getExchange(body.exchange);
    const entry = bot.scanner.addWatched(body.symbol, body.exchange, body.timeframes);
    res.status(201).json({ success: true, data: entry });
  });

  const unwatch = (symbol: string, res: express.Response) => {
    if (!bot.scanner.removeWatched(symbol)) {
      throw new NotFoundError(`${symbol} is not watched`);
    }
    res.json({ success: true });
  };

  // Pair symbols carry a slash, as in /api/watchlist/BTC/USDT
  app.delete('/api/watchlist/:base/:quote', (req, res) => {
    unwatch(`${req.params.base}/${req.params.quote}`, res);
  });

  app.delete('/api/watchlist/:symbol', (req, res) => {
    unwatch(req.params.symbol, res);
  });

  // ---------- Positions & trades ----------

  app.get('/api/positions', route(async (req, res) => {
    const query = positionsQuerySchema.parse(req.query);
    const positions = await bot.store.listPositions(query.status, query.limit);
    res.json({ success: true, data: positions });
  }));

  app.post('/api/positions/:id/close', route(async (req, res) => {
    const position = await bot.closePosition(idParamSchema.parse(req.params.id));
    res.json({ success: true, data: position });
  }));

  app.put('/api/positions/:id/stop-loss', route(async (req, res) => {
    const id = idParamSchema.parse(req.params.id);
    const { stopLossPrice } = stopLossSchema.parse(req.body);
    await bot.setStopLoss(id, stopLossPrice);
    res.json({ success: true, data: await bot.store.getPosition(id) });
  }));

  app.get('/api/trades', route(async (req, res) => {
    const { limit, ...filter } = tradesQuerySchema.parse(req.query);
    res.json({ success: true, data: await bot.store.getTradeLogs(limit, filter) });
  }));

  app.get('/api/performance', route(async (req, res) => {
    res.json({ success: true, data: await bot.store.getPerformance() });
  }));

  // ---------- Strategy ----------

  app.get('/api/strategy/configs', route(async (req, res) => {
    const configs = await bot.store.listStrategyConfigs(req.query.active === 'true');
    res.json({
      success: true,
      data: configs.map(c => ({ ...c, parameters: toStrategyInput(c.parameters) })),
    });
  }));

  app.post('/api/strategy/configs', route(async (req, res) => {
    const body = strategyConfigSchema.parse(req.body);
    const exchange = bot.getExchange(body.exchange).getExchangeName();
    const saved = await bot.store.saveStrategyConfig(exchange, body.symbol, parseStrategyParameters(body.parameters));
    res.status(201).json({ success: true, data: { ...saved, parameters: toStrategyInput(saved.parameters) } });
  }));

  app.delete('/api/strategy/configs/:id', route(async (req, res) => {
    const deleted = await bot.store.deleteStrategyConfig(idParamSchema.parse(req.params.id));
    if (!deleted) throw new NotFoundError(`Strategy config ${req.params.id} not found`);
    res.json({ success: true });
  }));

  app.post('/api/strategy/start', route(async (req, res) => {
    const body = startStrategySchema.parse(req.body);
    const exchange = bot.getExchange(body.exchange).getExchangeName();

    let params: StrategyParameters;
    if (body.parameters) {
      params = parseStrategyParameters(body.parameters);
    } else {
      const saved = await bot.store.getStrategyConfig(exchange, body.symbol);
      if (!saved) throw new NotFoundError(`No saved strategy config for ${exchange} ${body.symbol}`);
      params = saved.parameters;
    }

    const status = await bot.startStrategy(exchange, body.symbol, params);
    res.status(201).json({ success: true, data: status });
  }));

  app.post('/api/strategy/stop', route(async (req, res) => {
    const { symbol } = symbolSchema.parse(req.body);
    if (!(await bot.stopStrategy(symbol))) {
      throw new NotFoundError(`No strategy running for ${symbol}`);
    }
    res.json({ success: true });
  }));

  app.post('/api/strategy/pause', (req, res) => {
    const { symbol } = symbolSchema.parse(req.body);
    bot.pauseStrategy(symbol);
    res.json({ success: true });
  });

  app.post('/api/strategy/resume', (req, res) => {
    const { symbol } = symbolSchema.parse(req.body);
    bot.resumeStrategy(symbol);
    res.json({ success: true });
  });

  app.get('/api/strategy/status', route(async (req, res) => {
    res.json({ success: true, data: await bot.getStrategyStatus() });
  }));

  // ---------- Indicators ----------

  app.get('/api/indicators/atr/:exchange/:base/:quote', route(async (req, res) => {
    const { exchange, base, quote } = req.params;
    const timeframe = typeof req.query.timeframe === 'string' ? req.query.timeframe : '1h';
    const suggestion = await bot.suggestParameters(exchange, `${base}/${quote}`, timeframe);
    if (!suggestion) {
      throw new NotFoundError(`Not enough candles for ATR on ${base}/${quote} ${timeframe}`);
    }
    res.json({ success: true, data: suggestion });
  }));

  app.use(/.*/, (req, res) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found'
    });
  });

  // Error handling
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ success: false, error: err.flatten() });
      return;
    }
    if (err instanceof ConfigurationError || err instanceof RangeError) {
      res.status(400).json({ success: false, error: err.message });
      return;
    }
    if (err instanceof NotFoundError) {
      res.status(404).json({ success: false, error: err.message });
      return;
    }
    if (err instanceof ExchangeError) {
      log.warn(`Exchange error on ${req.method} ${req.path}`, { error: err });
      res.status(502).json({ success: false, error: err.message });
      return;
    }

    log.error(`Unhandled error on ${req.method} ${req.path}`, { error: err });
    res.status(500).json({
      success: false,
      error: err instanceof PersistenceError ? 'Storage error' : 'Internal server error'
    });
  });

  return app;
}

/**
 * Pushes every scanned signal to connected WebSocket clients on /ws.
 */
export function attachSignalStream(server: Server, bot: TradingBot): WebSocketServer {
  const wss = new WebSocketServer({ server, path: '/ws' });

  const broadcast: SignalObserver = (symbol, timeframe, signal) => {
    const payload = JSON.stringify({ type: 'signal', symbol, timeframe, signal });
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(payload);
    }
  };

  bot.scanner.register(broadcast);
  wss.on('connection', (socket) => {
    socket.send(JSON.stringify({ type: 'snapshot', signals: bot.scanner.latestSignal() }));
  });
  wss.on('close', () => bot.scanner.unregister(broadcast));

  return wss;
}

// Start server
async function startServer(): Promise<void> {
  try {
    assertRuntimeEnv(config);

    const bot = new TradingBot(config);
    await bot.start();

    const app = createApp(bot);
    const server = app.listen(config.server.port, config.server.host, () => {
      logger.info(`🌟 Trading Bot API running on port ${config.server.port}`);
    });
    const wss = attachSignalStream(server, bot);

    // Graceful shutdown
    const shutdown = () => {
      logger.info('Shutdown signal received, shutting down gracefully');

      wss.close();
      bot.stop()
        .catch((error) => log.error(`Bot shutdown failed: ${errorMessage(error)}`, { error }))
        .finally(() => {
          server.close(() => {
            logger.info('Process terminated');
            process.exit(0);
          });
        });
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    log.error(`Failed to start server: ${errorMessage(error)}`, { error });
    process.exit(1);
  }
}

if (require.main === module) {
  void startServer();
}
