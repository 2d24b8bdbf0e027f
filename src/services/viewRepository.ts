import neo4j, { Driver, Record as Neo4jRecord, Session } from 'neo4j-driver';
import { Logger } from '../utils/logger';
import { DailyViewTotal, PopularAggregate, SearchTermAggregate, ViewCounter, ViewCounterKey } from '../types';
import { isAlreadyExistsError, isNeo4jError, toNumber, toOptionalString } from '../utils/neo4j';
import { dayKey } from './timeWindows';

export interface ViewDetails {
    deviceType: string | null;
    ipAddress: string | null;
}

export interface AggregateQuery {
    /** Only rows last seen at or after this instant count. */
    since: Date;
    limit: number;
    contentType?: string;
}

export interface DailyViewsQuery {
    /** First local day included, `YYYY-MM-DD`. */
    fromDay: string;
    contentType?: string;
    contentReference?: string;
}

export interface SearchTermsQuery {
    since: Date;
    limit: number;
}

/**
 * Durable per-reader view counters, plus a per-day total for each item. Implementations must make
 * `recordView` an increment-or-insert on the composite key.
 */
export interface ViewRepository {
    recordView(key: ViewCounterKey, seenAt: Date, details: ViewDetails): Promise<ViewCounter>;
    findByKey(key: ViewCounterKey): Promise<ViewCounter | undefined>;
    /** Rows grouped by content, summed count descending, ties by most recent view. */
    aggregate(query: AggregateQuery): Promise<PopularAggregate[]>;
    userHistory(userKey: string, limit: number): Promise<ViewCounter[]>;
    /** Views per local day from `fromDay` on, oldest first. Days without views are absent. */
    dailyViews(query: DailyViewsQuery): Promise<DailyViewTotal[]>;
    /** `search` rows grouped by trimmed, lower-cased query; most searched first. */
    searchTerms(query: SearchTermsQuery): Promise<SearchTermAggregate[]>;
    initializeSchema(): Promise<void>;
    close(): Promise<void>;
}

const COUNTER_PROJECTION = `
    v.content_type AS contentType,
    v.content_reference AS contentReference,
    v.user_key AS userKey,
    v.view_count AS viewCount,
    v.first_viewed_at AS firstViewedAt,
    v.last_viewed_at AS lastViewedAt,
    v.device_type AS deviceType,
    v.ip_address AS ipAddress
`;

function toViewCounter(record: Neo4jRecord): ViewCounter {
    return {
        contentType: String(record.get('contentType')),
        contentReference: String(record.get('contentReference')),
        userKey: String(record.get('userKey')),
        viewCount: toNumber(record.get('viewCount')),
        firstViewedAt: String(record.get('firstViewedAt')),
        lastViewedAt: String(record.get('lastViewedAt')),
        deviceType: toOptionalString(record.get('deviceType')),
        ipAddress: toOptionalString(record.get('ipAddress')),
    };
}

function toAggregate(record: Neo4jRecord): PopularAggregate {
    return {
        contentType: String(record.get('contentType')),
        contentReference: String(record.get('contentReference')),
        totalViews: toNumber(record.get('totalViews')),
        uniqueViewers: toNumber(record.get('uniqueViewers')),
        lastViewedAt: String(record.get('lastViewedAt')),
    };
}

/**
 * Stores each counter as a `(:ContentView)` node and each item's daily total
 * as a `(:ContentViewDay)` node. Timestamps are ISO-8601 UTC strings so range
 * filters compare lexicographically.
 */
export class Neo4jViewRepository implements ViewRepository {
    constructor(
        private readonly driver: Driver,
        private readonly database: string,
        private readonly logger: Logger,
    ) {}

    private async run(query: string, params: Record<string, unknown>): Promise<Neo4jRecord[]> {
        let session: Session | undefined;
        try {
            session = this.driver.session({ database: this.database });
            const result = await session.run(query, params);
            return result.records;
        } catch (error) {
            this.logger.error(
                { err: error, code: isNeo4jError(error) ? error.code : undefined },
                'Neo4j view query failed',
            );
            throw error;
        } finally {
            if (session) {
                await session.close();
            }
        }
    }

    async recordView(key: ViewCounterKey, seenAt: Date, details: ViewDetails): Promise<ViewCounter> {
        const query = `
            MERGE (v:ContentView {
                content_type: $contentType,
                content_reference: $contentReference,
                user_key: $userKey
            })
            ON CREATE SET
                v.view_count = 1,
                v.first_viewed_at = $seenAt,
                v.last_viewed_at = $seenAt,
                v.device_type = $deviceType,
                v.ip_address = $ipAddress
            ON MATCH SET
                v.view_count = v.view_count + 1,
                v.last_viewed_at = $seenAt,
                v.device_type = coalesce($deviceType, v.device_type),
                v.ip_address = coalesce($ipAddress, v.ip_address)
            MERGE (d:ContentViewDay {
                content_type: $contentType,
                content_reference: $contentReference,
                day: $day
            })
            ON CREATE SET d.view_count = 1
            ON MATCH SET d.view_count = d.view_count + 1
            RETURN ${COUNTER_PROJECTION}
        `;
        const records = await this.run(query, {
            ...key,
            seenAt: seenAt.toISOString(),
            day: dayKey(seenAt),
            deviceType: details.deviceType,
            ipAddress: details.ipAddress,
        });
        const [record] = records;
        if (!record) {
            throw new Error(`MERGE returned no row for ${key.contentType}:${key.contentReference}`);
        }
        return toViewCounter(record);
    }

    async findByKey(key: ViewCounterKey): Promise<ViewCounter | undefined> {
        const query = `
            MATCH (v:ContentView {
                content_type: $contentType,
                content_reference: $contentReference,
                user_key: $userKey
            })
            RETURN ${COUNTER_PROJECTION}
            LIMIT 1
        `;
        const [record] = await this.run(query, { ...key });
        return record ? toViewCounter(record) : undefined;
    }

    async aggregate({ since, limit, contentType }: AggregateQuery): Promise<PopularAggregate[]> {
        const query = `
            MATCH (v:ContentView)
            WHERE v.last_viewed_at >= $since
              AND ($contentType IS NULL OR v.content_type = $contentType)
            WITH v.content_type AS contentType,
                 v.content_reference AS contentReference,
                 sum(v.view_count) AS totalViews,
                 count(v) AS uniqueViewers,
                 max(v.last_viewed_at) AS lastViewedAt
            RETURN contentType, contentReference, totalViews, uniqueViewers, lastViewedAt
            ORDER BY totalViews DESC, lastViewedAt DESC
            LIMIT $limit
        `;
        const records = await this.run(query, {
            since: since.toISOString(),
            contentType: contentType ?? null,
            limit: neo4j.int(Math.floor(limit)),
        });
        return records.map(toAggregate);
    }

    async userHistory(userKey: string, limit: number): Promise<ViewCounter[]> {
        const query = `
            MATCH (v:ContentView {user_key: $userKey})
            RETURN ${COUNTER_PROJECTION}
            ORDER BY v.last_viewed_at DESC
            LIMIT $limit
        `;
        const records = await this.run(query, { userKey, limit: neo4j.int(Math.floor(limit)) });
        return records.map(toViewCounter);
    }

    async dailyViews({ fromDay, contentType, contentReference }: DailyViewsQuery): Promise<DailyViewTotal[]> {
        const query = `
            MATCH (d:ContentViewDay)
            WHERE d.day >= $fromDay
              AND ($contentType IS NULL OR d.content_type = $contentType)
              AND ($contentReference IS NULL OR d.content_reference = $contentReference)
            RETURN d.day AS day, sum(d.view_count) AS views
            ORDER BY day
        `;
        const records = await this.run(query, {
            fromDay,
            contentType: contentType ?? null,
            contentReference: contentReference ?? null,
        });
        return records.map(record => ({
            day: String(record.get('day')),
            views: toNumber(record.get('views')),
        }));
    }

    async searchTerms({ since, limit }: SearchTermsQuery): Promise<SearchTermAggregate[]> {
        const query = `
            MATCH (v:ContentView {content_type: 'search'})
            WHERE v.last_viewed_at >= $since
            WITH toLower(trim(v.content_reference)) AS term, v
            WHERE term <> ''
            WITH term,
                 sum(v.view_count) AS totalSearches,
                 count(DISTINCT v.user_key) AS uniqueSearchers,
                 max(v.last_viewed_at) AS lastSearchedAt
            RETURN term, totalSearches, uniqueSearchers, lastSearchedAt
            ORDER BY totalSearches DESC, lastSearchedAt DESC
            LIMIT $limit
        `;
        const records = await this.run(query, {
            since: since.toISOString(),
            limit: neo4j.int(Math.floor(limit)),
        });
        return records.map(record => ({
            term: String(record.get('term')),
            totalSearches: toNumber(record.get('totalSearches')),
            uniqueSearchers: toNumber(record.get('uniqueSearchers')),
            lastSearchedAt: String(record.get('lastSearchedAt')),
        }));
    }

    async initializeSchema(): Promise<void> {
        this.logger.info('Initializing view schema...');
        const statements = [
            'CREATE CONSTRAINT content_view_key_unique IF NOT EXISTS FOR (v:ContentView) REQUIRE (v.content_type, v.content_reference, v.user_key) IS UNIQUE',
            'CREATE INDEX content_view_last_viewed_index IF NOT EXISTS FOR (v:ContentView) ON (v.last_viewed_at)',
            'CREATE INDEX content_view_user_index IF NOT EXISTS FOR (v:ContentView) ON (v.user_key)',
            'CREATE CONSTRAINT content_view_day_key_unique IF NOT EXISTS FOR (d:ContentViewDay) REQUIRE (d.content_type, d.content_reference, d.day) IS UNIQUE',
            'CREATE INDEX content_view_day_index IF NOT EXISTS FOR (d:ContentViewDay) ON (d.day)',
        ];

        for (const statement of statements) {
            try {
                await this.run(statement, {});
            } catch (error) {
                if (isAlreadyExistsError(error)) {
                    this.logger.info({ statement: statement.substring(0, 50) }, 'Schema element already exists');
                } else {
                    throw error;
                }
            }
        }
        this.logger.info('View schema ready.');
    }

    async close(): Promise<void> {
        await this.driver.close();
        this.logger.info('Neo4j driver closed.');
    }
}
