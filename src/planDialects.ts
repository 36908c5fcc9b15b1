import { DatabaseProvider, PlanFormat } from './executionPlan';
import { PlanOptions, PlanRow, QueryPlanRow } from './types';

/**
 * How one database is switched into plan mode and how its plan is read back
 */
export interface PlanDialect {
    readonly provider: DatabaseProvider;
    readonly format: PlanFormat;
    // session toggles; absent when plan mode is a statement prefix
    readonly enableStatement?: string;
    readonly disableStatement?: string;
    // bounds the plan statement on the server; must not outlive the session
    timeoutStatement?(timeoutMs: number): string;
    planStatement(commandText: string): string;
    extractPlan(rows: PlanRow[]): string | null;
}

function stringify(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value;
    return JSON.stringify(value, null, 2);
}

function isQueryPlanRow(row: PlanRow): row is PlanRow & QueryPlanRow {
    return 'QUERY PLAN' in row;
}

const sqlServerDialect: PlanDialect = {
    provider: 'SqlServer',
    format: 'xml',
    enableStatement: 'SET SHOWPLAN_XML ON',
    disableStatement: 'SET SHOWPLAN_XML OFF',
    planStatement: commandText => commandText,
    extractPlan: rows => {
        const first = rows[0];
        return first ? stringify(Object.values(first)[0]) : null;
    },
};

function postgresDialect(options: PlanOptions): PlanDialect {
    const flags = ['FORMAT JSON'];
    if (options.verbose) flags.push('VERBOSE');
    if (options.costs) flags.push('COSTS');
    if (options.settings) flags.push('SETTINGS');
    if (options.summary) flags.push('SUMMARY');
    const prefix = `EXPLAIN (${flags.join(', ')})`;

    return {
        provider: 'PostgreSQL',
        format: 'json',
        timeoutStatement: timeoutMs => `SET LOCAL statement_timeout = ${Math.max(1, Math.ceil(timeoutMs))}`,
        planStatement: commandText => `${prefix} ${commandText}`,
        extractPlan: rows => {
            const first = rows[0];
            return first && isQueryPlanRow(first) ? stringify(first['QUERY PLAN']) : null;
        },
    };
}

const mySqlDialect: PlanDialect = {
    provider: 'MySQL',
    format: 'json',
    planStatement: commandText => `EXPLAIN FORMAT=JSON ${commandText}`,
    extractPlan: rows => {
        const first = rows[0];
        return first ? stringify(first.EXPLAIN ?? Object.values(first)[0]) : null;
    },
};

const sqliteDialect: PlanDialect = {
    provider: 'SQLite',
    format: 'text',
    planStatement: commandText => `EXPLAIN QUERY PLAN ${commandText}`,
    extractPlan: rows => {
        const lines = rows
            .map(row => row.detail)
            .filter((detail): detail is string => typeof detail === 'string');
        return lines.length > 0 ? lines.join('\n') : null;
    },
};

/**
 * Returns undefined for providers without plan support
 */
export function getPlanDialect(provider: DatabaseProvider, options: PlanOptions = {}): PlanDialect | undefined {
    switch (provider) {
        case 'SqlServer':
            return sqlServerDialect;
        case 'PostgreSQL':
            return postgresDialect(options);
        case 'MySQL':
            return mySqlDialect;
        case 'SQLite':
            return sqliteDialect;
        default:
            return undefined;
    }
}
