/**
 * Transaction attribute a trigger looks at.
 */
export type TriggerField =
    | 'description'
    | 'accountName'
    | 'counterParty'
    | 'standardizedName'
    | 'amount'
    | 'date'
    | 'iban'
    | 'counterIban'
    | 'transactionType'
    | 'category'
    | 'notes'
    | 'externalId'
    | 'internalReference'
    | 'tags';

export const TRIGGER_FIELDS = [
    'description',
    'accountName',
    'counterParty',
    'standardizedName',
    'amount',
    'date',
    'iban',
    'counterIban',
    'transactionType',
    'category',
    'notes',
    'externalId',
    'internalReference',
    'tags',
] as const satisfies readonly TriggerField[];

export type TriggerOperator =
    | 'contains'
    | 'startsWith'
    | 'endsWith'
    | 'equals'
    | 'matches'
    | 'greaterThan'
    | 'lessThan'
    | 'greaterThanOrEqual'
    | 'lessThanOrEqual'
    | 'between'
    | 'before'
    | 'after'
    | 'on'
    | 'today'
    | 'yesterday'
    | 'tomorrow'
    | 'isEmpty'
    | 'isNotEmpty';

export const TRIGGER_OPERATORS = [
    'contains',
    'startsWith',
    'endsWith',
    'equals',
    'matches',
    'greaterThan',
    'lessThan',
    'greaterThanOrEqual',
    'lessThanOrEqual',
    'between',
    'before',
    'after',
    'on',
    'today',
    'yesterday',
    'tomorrow',
    'isEmpty',
    'isNotEmpty',
] as const satisfies readonly TriggerOperator[];

/**
 * Operators that ignore the trigger value.
 */
export const VALUELESS_OPERATORS: readonly TriggerOperator[] = ['today', 'yesterday', 'tomorrow', 'isEmpty', 'isNotEmpty'];

export type ActionType =
    | 'setCategory'
    | 'clearCategory'
    | 'setNotes'
    | 'setDescription'
    | 'appendDescription'
    | 'prependDescription'
    | 'addTag'
    | 'removeTag'
    | 'clearAllTags'
    | 'setCounterParty'
    | 'setSourceAccount'
    | 'setDestinationAccount'
    | 'swapAccounts'
    | 'convertToDeposit'
    | 'convertToWithdrawal'
    | 'convertToTransfer'
    | 'deleteTransaction'
    | 'setExternalId'
    | 'setInternalReference';

export const ACTION_TYPES = [
    'setCategory',
    'clearCategory',
    'setNotes',
    'setDescription',
    'appendDescription',
    'prependDescription',
    'addTag',
    'removeTag',
    'clearAllTags',
    'setCounterParty',
    'setSourceAccount',
    'setDestinationAccount',
    'swapAccounts',
    'convertToDeposit',
    'convertToWithdrawal',
    'convertToTransfer',
    'deleteTransaction',
    'setExternalId',
    'setInternalReference',
] as const satisfies readonly ActionType[];

/**
 * Action types that work without a value. convertToTransfer takes an optional destination account.
 */
export const VALUELESS_ACTIONS: readonly ActionType[] = [
    'clearCategory',
    'clearAllTags',
    'swapAccounts',
    'convertToDeposit',
    'convertToWithdrawal',
    'convertToTransfer',
    'deleteTransaction',
];

/**
 * `all` combines children with AND, `any` with OR.
 */
export type TriggerLogic = 'all' | 'any';

export interface Trigger {
    readonly field: TriggerField;
    readonly operator: TriggerOperator;

    /**
     * Comparison value, parsed according to the field type at evaluation time.
     */
    readonly value: string;

    /**
     * Inverts the operator result.
     */
    readonly negated: boolean;
}

export interface TriggerGroup {
    readonly logic: TriggerLogic;
    readonly triggers: readonly Trigger[];
    readonly groups: readonly TriggerGroup[];
}

export interface RuleAction {
    readonly type: ActionType;
    readonly value: string;
}

export interface RuleGroup {
    readonly id: string;
    readonly name: string;

    /**
     * Groups with a lower execution order run first when rule priorities tie.
     */
    readonly executionOrder: number;
    readonly isActive: boolean;
    readonly notes?: string;
}

/**
 * A rule pairs a trigger tree with an ordered list of actions.
 */
export interface Rule {
    readonly id: string;
    readonly name: string;

    /**
     * Rules with lower priority numbers are evaluated first.
     */
    readonly priority: number;
    readonly isActive: boolean;

    /**
     * No further rules are evaluated for a transaction once this rule matched it.
     */
    readonly stopProcessing: boolean;

    /**
     * Weak reference to the owning RuleGroup.
     */
    readonly groupId: string | null;

    /**
     * Root of the trigger tree. Records loaded from storage may lack it, such a rule matches nothing.
     */
    readonly triggerGroup: TriggerGroup | null;

    readonly actions: readonly RuleAction[];
    readonly matchCount: number;
    readonly lastMatchedAt: Date | null;
    readonly notes?: string;
}

export function isValuelessOperator(operator: TriggerOperator): boolean {
    return VALUELESS_OPERATORS.includes(operator);
}

export function actionRequiresValue(type: ActionType): boolean {
    return !VALUELESS_ACTIONS.includes(type);
}

/**
 * Detaches rules from a deleted group. Rules themselves are kept.
 */
export function ungroupRules(rules: readonly Rule[], groupId: string): Rule[] {
    return rules.map(rule => rule.groupId === groupId ? {...rule, groupId: null} : rule);
}

/**
 * Human-readable one-line summary, e.g. `IF Description contains "netflix" THEN setCategory "Subscriptions"`.
 */
export function describeRule(rule: Rule): string {
    const group = rule.triggerGroup;
    const triggerCount = group ? group.triggers.length + group.groups.length : 0;

    let summary = 'IF ';
    if (!group || triggerCount === 0) {
        summary += 'no conditions';
    } else if (triggerCount > 1 || group.groups.length > 0) {
        summary += `${triggerCount} conditions (${group.logic === 'all' ? 'ALL' : 'ANY'})`;
    } else {
        summary += describeTrigger(group.triggers[0]);
    }

    summary += ' THEN ';
    if (rule.actions.length === 0) {
        summary += 'no actions';
    } else if (rule.actions.length > 1) {
        summary += `${rule.actions.length} actions`;
    } else {
        const action = rule.actions[0];
        summary += action.value ? `${action.type} "${action.value}"` : action.type;
    }
    return summary;
}

export function describeTrigger(trigger: Trigger): string {
    const prefix = trigger.negated ? 'NOT ' : '';
    return isValuelessOperator(trigger.operator)
        ? `${prefix}${trigger.field} ${trigger.operator}`
        : `${prefix}${trigger.field} ${trigger.operator} "${trigger.value}"`;
}
