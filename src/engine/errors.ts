/**
 * Base class of every error raised by the rule engine.
 */
export class RuleEngineError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * An action value is missing or malformed for its action type.
 */
export class ValidationError extends RuleEngineError {
}

/**
 * An action refers to an account (or account marker) that does not exist.
 */
export class ReferenceNotFoundError extends RuleEngineError {
}

/**
 * The underlying store failed. Fatal for the transaction being processed.
 */
export class StoreError extends RuleEngineError {
}

/**
 * A rule record could not be turned into a Rule.
 */
export class RuleDefinitionError extends RuleEngineError {
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
