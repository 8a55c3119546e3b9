/**
 * Errors raised while building filters from operator configuration.
 * Request-time input never raises: malformed values degrade to "absent".
 */

import type { ZodIssue } from 'zod';

export class FilterDefinitionError extends Error {
    public readonly filterName: string;
    public readonly issues: readonly ZodIssue[];

    constructor(filterName: string, issues: readonly ZodIssue[]) {
        const detail = issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        super(`Invalid filter definition "${filterName || '(unnamed)'}": ${detail}`);
        this.name = 'FilterDefinitionError';
        this.filterName = filterName;
        this.issues = issues;
    }
}

export function isFilterDefinitionError(error: unknown): error is FilterDefinitionError {
    return error instanceof FilterDefinitionError;
}
