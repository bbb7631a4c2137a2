import {Decimal} from 'decimal.js';
import {isValuelessOperator, Trigger, TriggerField, TriggerGroup, TriggerOperator} from "../entities/Rule";
import {isTransactionType, Transaction, TransactionType, UNCATEGORIZED} from "../entities/Transaction";
import {EngineLogger} from "../logger";
import {extractField, FieldKind, fieldKind, FieldValue} from "./FieldAccessor";
import {formatDecimal, localDayKey, parseDay, parseDecimal, RANGE_SEPARATOR, splitRange} from "./values";

const TEXT_OPERATORS: readonly TriggerOperator[] = ['contains', 'startsWith', 'endsWith', 'equals', 'matches', 'isEmpty', 'isNotEmpty'];

const OPERATORS_BY_KIND: Record<FieldKind, readonly TriggerOperator[]> = {
    text: TEXT_OPERATORS,
    category: TEXT_OPERATORS,
    tags: TEXT_OPERATORS,
    transactionType: TEXT_OPERATORS,
    number: [...TEXT_OPERATORS, 'greaterThan', 'lessThan', 'greaterThanOrEqual', 'lessThanOrEqual', 'between'],
    date: [
        'equals', 'on', 'before', 'after', 'greaterThan', 'lessThan', 'greaterThanOrEqual', 'lessThanOrEqual',
        'between', 'today', 'yesterday', 'tomorrow', 'isEmpty', 'isNotEmpty',
    ],
};

const TYPE_ALIASES: Record<string, TransactionType> = {
    deposit: 'income',
    withdrawal: 'expense',
};

const REGEX_CACHE_LIMIT = 1000;

export type TriggerValidationResult =
    | { readonly valid: true }
    | { readonly valid: false; readonly message: string; readonly suggestion: string };

export interface TriggerEvaluatorOptions {
    readonly logger?: EngineLogger;
    readonly now?: () => Date;
}

export function validOperators(field: TriggerField): readonly TriggerOperator[] {
    return OPERATORS_BY_KIND[fieldKind(field)];
}

/**
 * Resolves a transaction type name, accepting `deposit` and `withdrawal` as aliases.
 */
export function normalizeTransactionType(value: string): TransactionType | null {
    const normalized = value.trim().toLowerCase();
    if (isTransactionType(normalized)) {
        return normalized;
    }
    return TYPE_ALIASES[normalized] ?? null;
}

/**
 * Evaluates triggers and trigger groups against transactions.
 *
 * Evaluation never throws: a comparison value that cannot be parsed for the field type,
 * an invalid regular expression or an operator that does not apply to the field all
 * make the trigger evaluate to false (before negation).
 */
export class TriggerEvaluator {

    private readonly logger: EngineLogger;
    private readonly now: () => Date;
    private readonly regexCache = new Map<string, RegExp | null>();

    constructor(options: TriggerEvaluatorOptions = {}) {
        this.logger = options.logger ?? console;
        this.now = options.now ?? (() => new Date());
    }

    evaluate(trigger: Trigger, transaction: Transaction): boolean {
        const raw = this.applyOperator(trigger.operator, extractField(trigger.field, transaction), trigger.value);
        return trigger.negated ? !raw : raw;
    }

    /**
     * Evaluates a trigger tree. Triggers are evaluated before nested groups, both in order,
     * stopping at the first false child for `all` and at the first true child for `any`.
     *
     * An empty `all` group matches everything, an empty `any` group matches nothing
     * and a missing group matches nothing.
     */
    evaluateGroup(group: TriggerGroup | null | undefined, transaction: Transaction): boolean {
        if (!group) {
            return false;
        }

        if (group.logic === 'all') {
            for (const trigger of group.triggers) {
                if (!this.evaluate(trigger, transaction)) {
                    return false;
                }
            }
            for (const child of group.groups) {
                if (!this.evaluateGroup(child, transaction)) {
                    return false;
                }
            }
            return true;
        }

        for (const trigger of group.triggers) {
            if (this.evaluate(trigger, transaction)) {
                return true;
            }
        }
        for (const child of group.groups) {
            if (this.evaluateGroup(child, transaction)) {
                return true;
            }
        }
        return false;
    }

    /**
     * Checks a trigger for editor feedback. Evaluation does not require a trigger to be valid.
     */
    validate(trigger: Trigger): TriggerValidationResult {
        const kind = fieldKind(trigger.field);
        const allowed = OPERATORS_BY_KIND[kind];

        if (!allowed.includes(trigger.operator)) {
            return invalid(`${trigger.operator} is not valid for ${trigger.field}`, `Try operators: ${allowed.join(', ')}`);
        }
        if (isValuelessOperator(trigger.operator)) {
            return {valid: true};
        }
        if (trigger.value.trim() === '') {
            return invalid(`${trigger.operator} requires a value`, 'Enter a value to compare with');
        }

        if (trigger.operator === 'matches') {
            return this.compileRegex(trigger.value) === null
                ? invalid('Invalid regular expression pattern', "Check the pattern syntax, e.g. '^AH [0-9]+'")
                : {valid: true};
        }

        if (kind === 'transactionType' && trigger.operator === 'equals' && normalizeTransactionType(trigger.value) === null) {
            return invalid(`Unknown transaction type "${trigger.value}"`, 'Use income, expense, transfer, deposit or withdrawal');
        }

        if (kind !== 'number' && kind !== 'date') {
            return {valid: true};
        }
        if (kind === 'number' && ['contains', 'startsWith', 'endsWith'].includes(trigger.operator)) {
            return {valid: true};
        }

        const bounds = trigger.operator === 'between' ? splitRange(trigger.value) : [trigger.value];
        if (bounds === null) {
            return invalid(`between needs two bounds separated by "${RANGE_SEPARATOR}"`, `Example: 100${RANGE_SEPARATOR}250`);
        }
        for (const bound of bounds) {
            if (kind === 'number' && parseDecimal(bound) === null) {
                return invalid('Amount must be a valid number', 'Examples: 100, 50.75, 1500');
            }
            if (kind === 'date' && parseDay(bound) === null) {
                return invalid('Invalid date format', 'Use YYYY-MM-DD, DD/MM/YYYY or DD-MM-YYYY (e.g. 2025-12-31)');
            }
        }
        return {valid: true};
    }

    private applyOperator(operator: TriggerOperator, field: FieldValue, expected: string): boolean {
        switch (field.kind) {
            case 'text':
                return this.compareText(operator, field.value, expected);
            case 'category':
                if (operator === 'isEmpty' || operator === 'isNotEmpty') {
                    return (field.value === UNCATEGORIZED) === (operator === 'isEmpty');
                }
                return this.compareText(operator, field.value, expected);
            case 'number':
                return this.compareNumber(operator, field.value, expected);
            case 'date':
                return this.compareDate(operator, field.value, expected);
            case 'transactionType':
                return this.compareTransactionType(operator, field.value, expected);
            case 'tags':
                if (operator === 'isEmpty' || operator === 'isNotEmpty') {
                    return (field.value.length === 0) === (operator === 'isEmpty');
                }
                return field.value.some(tag => this.compareText(operator, tag, expected));
        }
    }

    private compareText(operator: TriggerOperator, actual: string, expected: string): boolean {
        const haystack = actual.toLowerCase();
        const needle = expected.toLowerCase();

        switch (operator) {
            case 'contains':
                return haystack.includes(needle);
            case 'startsWith':
                return haystack.startsWith(needle);
            case 'endsWith':
                return haystack.endsWith(needle);
            case 'equals':
                return haystack === needle;
            case 'matches': {
                const regex = this.compileRegex(expected);
                return regex !== null && regex.test(actual);
            }
            case 'isEmpty':
                return actual.trim() === '';
            case 'isNotEmpty':
                return actual.trim() !== '';
            default:
                return false;
        }
    }

    private compareNumber(operator: TriggerOperator, actual: Decimal, expected: string): boolean {
        switch (operator) {
            case 'isEmpty':
                return false;
            case 'isNotEmpty':
                return true;
            case 'contains':
            case 'startsWith':
            case 'endsWith':
            case 'matches':
                return this.compareText(operator, formatDecimal(actual), expected);
            case 'between': {
                const range = parseRange(expected, parseDecimal);
                if (range === null) {
                    return false;
                }
                const [low, high] = range[0].lte(range[1]) ? range : [range[1], range[0]];
                return actual.gte(low) && actual.lte(high);
            }
            default: {
                const target = parseDecimal(expected);
                if (target === null) {
                    return false;
                }
                switch (operator) {
                    case 'equals':
                        return actual.eq(target);
                    case 'greaterThan':
                        return actual.gt(target);
                    case 'lessThan':
                        return actual.lt(target);
                    case 'greaterThanOrEqual':
                        return actual.gte(target);
                    case 'lessThanOrEqual':
                        return actual.lte(target);
                    default:
                        return false;
                }
            }
        }
    }

    private compareDate(operator: TriggerOperator, actual: string | null, expected: string): boolean {
        if (operator === 'isEmpty' || operator === 'isNotEmpty') {
            return (actual === null) === (operator === 'isEmpty');
        }
        if (actual === null) {
            return false;
        }

        switch (operator) {
            case 'today':
                return actual === localDayKey(this.now());
            case 'yesterday':
                return actual === localDayKey(this.now(), -1);
            case 'tomorrow':
                return actual === localDayKey(this.now(), 1);
            case 'between': {
                const range = parseRange(expected, parseDay);
                if (range === null) {
                    return false;
                }
                const [low, high] = range[0] <= range[1] ? range : [range[1], range[0]];
                return actual >= low && actual <= high;
            }
            default: {
                const target = parseDay(expected);
                if (target === null) {
                    return false;
                }
                switch (operator) {
                    case 'equals':
                    case 'on':
                        return actual === target;
                    case 'before':
                    case 'lessThan':
                        return actual < target;
                    case 'after':
                    case 'greaterThan':
                        return actual > target;
                    case 'lessThanOrEqual':
                        return actual <= target;
                    case 'greaterThanOrEqual':
                        return actual >= target;
                    default:
                        return false;
                }
            }
        }
    }

    private compareTransactionType(operator: TriggerOperator, actual: TransactionType, expected: string): boolean {
        switch (operator) {
            case 'equals':
                return normalizeTransactionType(expected) === actual;
            case 'isEmpty':
                return actual === 'unknown';
            case 'isNotEmpty':
                return actual !== 'unknown';
            default:
                return this.compareText(operator, actual, expected);
        }
    }

    private compileRegex(pattern: string): RegExp | null {
        const cached = this.regexCache.get(pattern);
        if (cached !== undefined) {
            return cached;
        }

        let regex: RegExp | null;
        try {
            regex = new RegExp(pattern, 'i');
        } catch (error) {
            this.logger.warn(`Invalid regex pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`);
            regex = null;
        }

        if (this.regexCache.size >= REGEX_CACHE_LIMIT) {
            this.regexCache.clear();
        }
        this.regexCache.set(pattern, regex);
        return regex;
    }
}

function parseRange<T>(value: string, parse: (bound: string) => T | null): [T, T] | null {
    const bounds = splitRange(value);
    if (bounds === null) {
        return null;
    }
    const low = parse(bounds[0]);
    const high = parse(bounds[1]);
    return low === null || high === null ? null : [low, high];
}

function invalid(message: string, suggestion: string): TriggerValidationResult {
    return {valid: false, message, suggestion};
}
