import { createApp, createDependencies } from './presentation/app';
import { getConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🚛 Border Gates API - starting...');

    // 1. Load and validate configuration
    console.log('📋 Loading configuration...');
    const config = getConfig();

    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    // 2. Create and start the app
    const dependencies = createDependencies(config);
    const app = createApp(config, dependencies);

    const server = app.listen(config.port, () => {
        console.log(`✅ Server running on http://localhost:${config.port}`);
        console.log(`   Environment: ${config.environment}`);
        console.log(`   Source: ${config.borderSourceUrl}`);
        console.log(`   Cache: ${config.redisUrl ? 'redis' : 'in-memory'}, TTL ${config.cacheTtlSeconds}s`);
    });

    const shutdown = (signal: string) => {
        console.log(`🛑 ${signal} received, shutting down...`);
        server.close(() => {
            dependencies.dispose()
                .then(() => process.exit(0))
                .catch((error) => {
                    console.error('Error while releasing resources:', error);
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
    console.error('💥 Fatal error during bootstrap:', error);
    process.exit(1);
});
