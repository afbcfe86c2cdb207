import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { ALL_ENTITIES } from '../entities';
import { getConfig } from './config';

const config = getConfig();

const options: DataSourceOptions = {
    type: 'better-sqlite3',
    database: config.database.path,
    entities: ALL_ENTITIES,
    synchronize: config.database.synchronize,
    logging: false,
};

export const dataSource = new DataSource(options);

/**
 * Opens the connection once; later calls reuse it.
 */
export async function initializeDataSource(): Promise<DataSource> {
    if (!dataSource.isInitialized) {
        await dataSource.initialize();
    }
    return dataSource;
}
