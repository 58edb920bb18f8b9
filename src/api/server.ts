import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { performance } from 'node:perf_hooks';
import { CricketService } from './cricketService';
import { ApiError, toErrorResponse } from './errors';

type RouteHandler<T> = (req: Request) => Promise<T> | T;

/** Converte qualquer falha em `{ error, detail }` com o status da classificação. */
export function sendError(req: Request, res: Response, error: unknown): void {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    console.error({ path: req.path, status, error: body.error, detail: body.detail }, 'Falha ao atender requisição');
  }
  res.status(status).json(body);
}

function route<T>(handler: RouteHandler<T>) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await handler(req));
    } catch (error) {
      sendError(req, res, error);
    }
  };
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = performance.now();
  res.on('finish', () => {
    const durationMs = Number((performance.now() - start).toFixed(2));
    console.log({ method: req.method, path: req.path, status: res.statusCode, durationMs }, 'HTTP');
  });
  next();
}

export function createApp(service: CricketService): express.Express {
  const app = express();

  // origin: true devolve a origem da requisição, o que permite credenciais com qualquer origem
  app.use(cors({ origin: true, credentials: true }));
  app.use(requestLogger);

  app.get('/', route(() => service.root()));
  app.get('/api/hello', route(() => service.hello()));
  app.get('/test', route(() => service.status()));

  app.get('/api/matches', route(req => service.listMatches(req.query.type)));
  app.get('/api/match/:matchId', route(req => service.getMatchDetail(req.params.matchId)));
  app.get('/api/rankings', route(req => service.getRankings(req.query.format)));
  app.get('/api/news', route(() => service.getNews()));
  app.get('/api/trending-players', route(() => service.getTrendingPlayers()));
  app.get('/api/tweets', route(req => service.searchTweets(req.query.query)));

  app.use((req: Request, res: Response) => {
    sendError(req, res, ApiError.notFound(`No route for ${req.method} ${req.path}`));
  });

  return app;
}
