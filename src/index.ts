/**
 * Process entry point
 *
 * Loads configuration, opens the store, starts the bridge and serves the
 * HTTP routes until SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { createDb } from '@/db';
import { BridgeCoordinator } from '@/lib/bridge/coordinator';
import { setBridge } from '@/lib/bridge/runtime';
import { loadConfig } from '@/lib/config';
import { ConfigError, errorMessage } from '@/lib/errors';
import { wsSocketFactory } from '@/lib/nostr/relay';
import { DrizzleStore } from '@/lib/store/drizzle-store';
import { MemoryStore } from '@/lib/store/memory-store';
import type { BridgeStore } from '@/lib/store/types';
import { createServer } from './server';

async function main(): Promise<void> {
    const config = loadConfig();

    let store: BridgeStore;
    if (config.databaseUrl) {
        store = new DrizzleStore(createDb(config.databaseUrl));
    } else {
        console.warn('[Bridge] DATABASE_URL is not set; state is kept in memory and lost on restart');
        store = new MemoryStore();
    }

    const bridge = new BridgeCoordinator({
        config,
        store,
        socketFactory: wsSocketFactory(config.userAgent),
    });
    let exhausted = 0;
    bridge.onDeliveryExhausted(() => {
        exhausted++;
    });
    await bridge.start();
    setBridge(bridge);

    const server = createServer(config.domain).listen(config.port, () => {
        console.log(`[Server] Listening on port ${config.port} as https://${config.domain}`);
    });

    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) return;
        stopping = true;
        console.log(`[Bridge] ${signal} received, shutting down (${exhausted} deliveries given up since start)`);
        server.close();
        bridge.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error('[Bridge] Shutdown failed:', errorMessage(error));
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        console.error(`[Config] ${error.message}`);
    } else {
        console.error('[Bridge] Failed to start:', errorMessage(error));
    }
    process.exit(1);
});
