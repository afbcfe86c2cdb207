import { config } from 'dotenv';
config({ path: '.env.local' });

import { getConfig } from './lib/config';
import { initializeDataSource } from './lib/data-source';
import { app } from './app';

async function main() {
    const { port, database } = getConfig();
    await initializeDataSource();
    console.log(`database ready at ${database.path}`);

    app.listen(port, () => {
        console.log(`rental-manager-service listening on http://localhost:${port}`);
    });
}

main().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
