import { createApp, createDependencies } from './presentation/app';
import { scheduleLogCleanup } from './application/Housekeeping';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🌐 Flag Relay - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Wire components and warm the cache from persistence
        console.log('🚀 Initializing application components...');
        const deps = createDependencies(config);
        await deps.pipeline.warmCache(config.cacheWarmLimit);
        scheduleLogCleanup(deps.usageRepository, config.logRetentionDays);

        // 3. Start the server
        const app = createApp(config, deps);
        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Translation provider: ${config.translationProvider}`);
        });

        const shutdown = (signal: string) => {
            console.log(`[App] ${signal} received, shutting down`);
            server.close(() => {
                deps.database?.close();
                process.exit(0);
            });
        };
        process.on('SIGTERM', () => shutdown('SIGTERM'));
        process.on('SIGINT', () => shutdown('SIGINT'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
