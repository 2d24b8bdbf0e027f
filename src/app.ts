import neo4j from 'neo4j-driver';
import config from './config/config';
import { Logger, logger as rootLogger } from './utils/logger';
import { CacheBackend } from './cache/cacheBackend';
import { CacheManager } from './cache/cacheManager';
import { MemoryCacheBackend } from './cache/memoryCacheBackend';
import { RedisCacheBackend } from './cache/redisCacheBackend';
import { ContentCache } from './services/contentCache';
import { DocumentSource, DocumentStore, FileDocumentSource } from './services/documentStore';
import { ReadingCompletionEstimator } from './services/completionEstimator';
import { SearchEngine } from './services/searchEngine';
import { Neo4jViewRepository, ViewRepository } from './services/viewRepository';
import { ViewTracker } from './services/viewTracker';

/** Everything a request handler needs, built once per process. */
export interface AppContext {
    logger: Logger;
    cache: CacheManager;
    store: DocumentStore;
    content: ContentCache;
    views: ViewTracker;
    search: SearchEngine;
    completion: ReadingCompletionEstimator;
    close(): Promise<void>;
}

export interface AppOverrides {
    logger?: Logger;
    cacheBackend?: CacheBackend;
    documentSource?: DocumentSource;
    viewRepository?: ViewRepository;
    now?: () => Date;
}

function defaultCacheBackend(logger: Logger): CacheBackend {
    if (config.redis.url) {
        return new RedisCacheBackend(config.redis.url, logger);
    }
    return new MemoryCacheBackend();
}

function defaultViewRepository(logger: Logger): ViewRepository {
    const driver = neo4j.driver(config.neo4j.uri, neo4j.auth.basic(config.neo4j.user, config.neo4j.password));
    return new Neo4jViewRepository(driver, config.neo4j.database, logger);
}

export function createAppContext(overrides: AppOverrides = {}): AppContext {
    const logger = overrides.logger ?? rootLogger;
    const now = overrides.now ?? (() => new Date());

    const cache = new CacheManager(overrides.cacheBackend ?? defaultCacheBackend(logger), {
        prefix: config.cache.prefix,
        logger,
    });
    const store = new DocumentStore(
        overrides.documentSource ?? new FileDocumentSource(config.paths.documentFile),
        logger,
        now,
    );
    const content = new ContentCache(cache, store, { ttl: config.cache.ttl, logger });
    const repository = overrides.viewRepository ?? defaultViewRepository(logger);
    const views = new ViewTracker(cache, repository, content, logger, now);
    const search = new SearchEngine(content, views, logger);
    const completion = new ReadingCompletionEstimator(content, logger);

    return {
        logger,
        cache,
        store,
        content,
        views,
        search,
        completion,
        async close() {
            await cache.close();
            await repository.close();
        },
    };
}
