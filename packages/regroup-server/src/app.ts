// regroup-server/src/app.ts

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { handleConvert } from './handler.js';
import type { HandlerDeps } from './handler.js';

export function createApp(deps: HandlerDeps): express.Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/healthz', (_req: Request, res: Response) => {
        res.type('text/plain').send('ok');
    });

    app.get('/convert', (req: Request, res: Response, next: NextFunction) => {
        handleConvert(req.query, deps)
            .then(result => {
                res.status(result.status).set(result.headers).send(result.body);
            })
            .catch(next);
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        deps.logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
        res.status(500).type('text/plain').send('Internal server error');
    });

    return app;
}
