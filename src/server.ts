/**
 * HTTP Server
 *
 * Mounts the route handlers under src/app on express. Handlers speak the
 * web-standard Request/Response; bodies reach them raw so the inbox can
 * check the Digest header against the exact bytes received.
 */

import express, { type NextFunction, type Request as ExpressRequest, type Response as ExpressResponse } from 'express';
import { GET as webfinger } from '@/app/.well-known/webfinger/route';
import { GET as nodeInfoLinks } from '@/app/.well-known/nodeinfo/route';
import { GET as nodeInfo } from '@/app/nodeinfo/2.1/route';
import { GET as actor } from '@/app/users/[npub]/route';
import { GET as followers } from '@/app/users/[npub]/followers/route';
import { GET as outbox } from '@/app/users/[npub]/outbox/route';
import { POST as userInbox } from '@/app/users/[npub]/inbox/route';
import { POST as sharedInbox } from '@/app/inbox/route';
import { GET as note } from '@/app/notes/[id]/route';

const MAX_BODY = '1mb';

/**
 * Web Request for an express request. The URL is rebuilt on the bridge's
 * public origin; headers and body pass through unchanged.
 */
export function toWebRequest(req: ExpressRequest, domain: string): Request {
    const headers = new Headers();
    for (const [name, value] of Object.entries(req.headers)) {
        if (value === undefined) continue;
        headers.set(name, Array.isArray(value) ? value.join(', ') : value);
    }
    const body = Buffer.isBuffer(req.body) && req.method !== 'GET' && req.method !== 'HEAD'
        ? req.body.toString('utf8')
        : undefined;

    return new Request(`https://${domain}${req.originalUrl}`, {
        method: req.method,
        headers,
        body,
    });
}

async function send(res: ExpressResponse, response: Response): Promise<void> {
    res.status(response.status);
    response.headers.forEach((value, name) => {
        res.setHeader(name, value);
    });
    res.send(Buffer.from(await response.arrayBuffer()));
}

type Handler = (req: ExpressRequest) => Promise<Response>;

function route(handler: Handler) {
    return (req: ExpressRequest, res: ExpressResponse, next: NextFunction) => {
        handler(req)
            .then((response) => send(res, response))
            .catch(next);
    };
}

export function createServer(domain: string): express.Application {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.raw({ type: '*/*', limit: MAX_BODY }));

    const web = (req: ExpressRequest) => toWebRequest(req, domain);
    const params = <P>(value: P) => ({ params: Promise.resolve(value) });

    app.get('/.well-known/webfinger', route((req) => webfinger(web(req))));
    app.get('/.well-known/nodeinfo', route(() => nodeInfoLinks()));
    app.get('/nodeinfo/2.1', route(() => nodeInfo()));

    app.get('/users/:npub', route((req) => actor(web(req), params({ npub: req.params.npub }))));
    app.get('/users/:npub/followers', route((req) => followers(web(req), params({ npub: req.params.npub }))));
    app.get('/users/:npub/outbox', route((req) => outbox(web(req), params({ npub: req.params.npub }))));
    app.post('/users/:npub/inbox', route((req) => userInbox(web(req), params({ npub: req.params.npub }))));
    app.post('/inbox', route((req) => sharedInbox(web(req))));
    app.get('/notes/:id', route((req) => note(web(req), params({ id: req.params.id }))));

    app.use((error: unknown, _req: ExpressRequest, res: ExpressResponse, _next: NextFunction) => {
        console.error('[Server] Unhandled error:', error);
        if (!res.headersSent) {
            res.status(500).json({ error: 'Internal server error' });
        }
    });

    return app;
}
