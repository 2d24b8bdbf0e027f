import neo4j from 'neo4j-driver';
import config from '../config/config';
import { logger } from '../utils/logger';
import { Neo4jViewRepository } from '../services/viewRepository';

async function main() {
    const driver = neo4j.driver(config.neo4j.uri, neo4j.auth.basic(config.neo4j.user, config.neo4j.password));
    const repository = new Neo4jViewRepository(driver, config.neo4j.database, logger);

    try {
        await driver.verifyConnectivity();
        logger.info('Neo4j Driver connected and verified.');
        await repository.initializeSchema();
    } catch (error) {
        logger.error({ err: error }, 'View schema initialization failed');
        process.exitCode = 1;
    } finally {
        await repository.close();
    }
}

void main();
