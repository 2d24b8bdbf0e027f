import neo4j, { Neo4jError } from 'neo4j-driver';

export function isNeo4jError(error: unknown): error is Neo4jError {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function isAlreadyExistsError(error: unknown): boolean {
    return isNeo4jError(error) && (
        error.message.includes('already exists') ||
        error.message.includes('ConstraintAlreadyExists') ||
        error.message.includes('IndexAlreadyExists') ||
        error.message.includes('EquivalentSchemaRuleAlreadyExists')
    );
}

/** Integers come back from the driver as `neo4j.Integer`. */
export function toNumber(value: unknown): number {
    if (neo4j.isInt(value)) return value.toNumber();
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return 0;
}

export function toOptionalString(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    return String(value);
}
