/**
 * Express app for the local web UI
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { fileURLToPath } from 'node:url';
import { printDebug } from '../cli/output.js';
import { createRouteHandlers, type HandlerDeps, type RouteHandler } from './handlers.js';

/** Static page assets, shipped beside src/ and dist/ */
export const PUBLIC_DIR = fileURLToPath(new URL('../../public/', import.meta.url));

function jsonRoute(handler: RouteHandler, source: 'body' | 'query') {
  return (req: Request, res: Response, next: NextFunction): void => {
    const input: unknown = source === 'body' ? req.body : req.query;
    handler(input)
      .then((result) => {
        res.json(result);
      })
      .catch(next);
  };
}

/**
 * Build the app: static page at `/`, JSON API under `/api`
 */
export function createApp(deps: HandlerDeps): Express {
  const app = express();
  const handlers = createRouteHandlers(deps);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    printDebug(`${req.method} ${req.path}`);
    next();
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(express.static(PUBLIC_DIR));

  app.get('/api/browse-folder', jsonRoute(handlers.browseFolder, 'query'));
  app.post('/api/analyze', jsonRoute(handlers.analyze, 'body'));
  app.post('/api/read-file', jsonRoute(handlers.readFile, 'body'));
  app.post('/api/generate', jsonRoute(handlers.generate, 'body'));
  app.get('/api/list-teams', jsonRoute(handlers.listTeams, 'query'));
  app.get('/api/list-sites', jsonRoute(handlers.listSites, 'query'));
  app.get('/api/check-cli', jsonRoute(handlers.checkCli, 'query'));
  app.post('/api/login', jsonRoute(handlers.login, 'body'));
  app.post('/api/init-site', jsonRoute(handlers.initSite, 'body'));
  app.post('/api/update-domain', jsonRoute(handlers.updateDomain, 'body'));
  app.post('/api/deploy', jsonRoute(handlers.deploy, 'body'));
  app.post('/api/run-command', jsonRoute(handlers.runCommand, 'body'));
  app.post('/api/chat', jsonRoute(handlers.chat, 'body'));
  app.post('/api/test-connection', jsonRoute(handlers.testConnection, 'body'));

  // Malformed JSON bodies and anything else express rejects
  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    printDebug(`Request failed: ${error.message}`);
    res.status(400).json({ success: false, error: error.message });
  });

  return app;
}
