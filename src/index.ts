import { config } from './config';
import { buildServer } from './server';

buildServer({ sweeper: true })
    .then(async (app) => {
        const shutdown = (signal: string) => {
            app.log.info({ signal }, 'Shutting down');
            app.close()
                .then(() => process.exit(0))
                .catch((err: unknown) => {
                    app.log.error({ err }, 'Error during shutdown');
                    process.exit(1);
                });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        await app.listen({ port: config.port, host: config.host });
    })
    .catch((err) => {
        // eslint-disable-next-line no-console
        console.error(err);
        process.exit(1);
    });
