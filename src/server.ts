import 'reflect-metadata';
import {serve} from '@hono/node-server';
import {config as loadDotenv} from 'dotenv';
import app from './index';
import {initializeApplication, shutdownApplication} from './config/app-initializer';
import {loadConfig} from './config/env';

async function main(): Promise<void> {
    loadDotenv();
    const config = loadConfig();

    await initializeApplication(config);

    const server = serve({fetch: app.fetch, port: config.PORT}, (info) => {
        console.log(`🌐 Listening on http://localhost:${info.port.toString()}`);
    });

    const shutdown = (signal: NodeJS.Signals): void => {
        console.log(`🛑 Received ${signal}, shutting down...`);
        server.close((closeError) => {
            shutdownApplication()
                .then(() => {
                    process.exit(closeError ? 1 : 0);
                })
                .catch((error: unknown) => {
                    console.error('❌ Shutdown failed:', error);
                    process.exit(1);
                });
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
});
