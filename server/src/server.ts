import { createServer } from 'node:http';
import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { ConnectionHub } from './infra/hub/connection-hub.js';
import { WebSocketManager } from './infra/websocket/websocket-manager.js';

const config = getConfig();

const hub = new ConnectionHub({ topicCapacity: config.topicCapacity });
const app = createApp({ hub, corsOrigins: config.corsOrigins });
const server = createServer(app);
const wsManager = new WebSocketManager(server, { hub }, config.ws);

server.listen(config.port, config.host, () => {
    logger.info({
        host: config.host,
        port: config.port,
        wsPath: config.ws.path,
        env: config.env
    }, `Server listening on http://${config.host}:${config.port}`);
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}. Shutting down gracefully...`);

    await wsManager.shutdown();
    hub.close();
    await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info('Server closed');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal)
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
                process.exit(1);
            });
    });
}
