/**
 * Callback Server
 * Loopback HTTP listener that receives the provider's authorization redirect
 */

import * as http from 'http';
import { ConsentDeniedError, ConsentTimeoutError } from './errors.js';

export interface CallbackServerOptions {
    /** 0 picks an ephemeral port */
    port?: number;
    host?: string;
    callbackPath?: string;
    /** The `state` sent with the authorization request */
    expectedState: string;
}

type Outcome = { code: string } | { error: Error };

interface Waiter {
    resolve: (code: string) => void;
    reject: (error: Error) => void;
}

const PAGE_STYLE =
    'font-family: system-ui; padding: 40px; text-align: center; background: #1a1a2e; color: #e0e0e0;';

function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function page(title: string, color: string, body: string): string {
    return `<html>
  <head><meta charset="utf-8"></head>
  <body style="${PAGE_STYLE}">
    <h1 style="color: ${color};">${title}</h1>
    <p>${body}</p>
    <p style="color: #888;">You can close this window.</p>
  </body>
</html>`;
}

export class CallbackServer {
    private readonly server: http.Server;
    private readonly host: string;
    private readonly callbackPath: string;
    private readonly expectedState: string;
    private outcome: Outcome | null = null;
    private waiter: Waiter | null = null;
    private timer: NodeJS.Timeout | null = null;
    private boundPort = 0;

    private constructor(options: CallbackServerOptions) {
        this.host = options.host ?? '127.0.0.1';
        this.callbackPath = options.callbackPath ?? '/';
        this.expectedState = options.expectedState;
        this.server = http.createServer((req, res) => this.handle(req, res));
    }

    /**
     * Start listening. Resolves once the port is bound.
     */
    static async listen(options: CallbackServerOptions): Promise<CallbackServer> {
        const callback = new CallbackServer(options);
        await new Promise<void>((resolve, reject) => {
            callback.server.once('error', reject);
            callback.server.listen(options.port ?? 0, callback.host, () => {
                callback.server.off('error', reject);
                resolve();
            });
        });

        const address = callback.server.address();
        if (address === null || typeof address === 'string') {
            callback.close();
            throw new Error('Callback server did not bind to a TCP port');
        }
        callback.boundPort = address.port;
        return callback;
    }

    get port(): number {
        return this.boundPort;
    }

    get redirectUri(): string {
        return `http://${this.host}:${this.boundPort}${this.callbackPath}`;
    }

    /**
     * Wait for the authorization code. The server is closed when this settles.
     */
    waitForCode(timeoutMs: number): Promise<string> {
        return new Promise<string>((resolve, reject) => {
            this.waiter = { resolve, reject };
            if (this.outcome) {
                this.settle();
                return;
            }
            this.timer = setTimeout(() => this.finish({ error: new ConsentTimeoutError(timeoutMs) }), timeoutMs);
        });
    }

    close(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.server.listening) {
            this.server.close();
        }
    }

    private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
        const url = new URL(req.url || '/', `http://${this.host}`);

        if (url.pathname !== this.callbackPath || this.outcome) {
            res.writeHead(404, { 'Content-Type': 'text/plain', Connection: 'close' });
            res.end('Not found');
            return;
        }

        const error = url.searchParams.get('error');
        const code = url.searchParams.get('code');
        const state = url.searchParams.get('state');

        if (state !== this.expectedState) {
            res.writeHead(400, { 'Content-Type': 'text/plain', Connection: 'close' });
            res.end('State mismatch');
            return;
        }

        if (error) {
            const description = url.searchParams.get('error_description') || error;
            res.writeHead(400, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
            res.end(page('❌ Authentication Failed', '#ff6b6b', escapeHtml(description)));
            this.finish({ error: new ConsentDeniedError(`Consent denied: ${description}`) });
            return;
        }

        if (!code) {
            res.writeHead(400, { 'Content-Type': 'text/plain', Connection: 'close' });
            res.end('Missing code');
            return;
        }

        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
        res.end(page('✅ Authentication Successful!', '#4ecdc4', 'Return to the terminal to continue.'));
        this.finish({ code });
    }

    private finish(outcome: Outcome): void {
        if (this.outcome) return;
        this.outcome = outcome;
        this.close();
        this.settle();
    }

    private settle(): void {
        const { outcome, waiter } = this;
        if (!outcome || !waiter) return;
        this.waiter = null;
        if ('code' in outcome) {
            waiter.resolve(outcome.code);
        } else {
            waiter.reject(outcome.error);
        }
    }
}
