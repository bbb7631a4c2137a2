import {Rule, RuleGroup} from "../entities/Rule";
import {Transaction} from "../entities/Transaction";
import {EngineLogger} from "../logger";
import {RuleStore} from "../store/RuleStore";
import {ActionExecutor, ExecutionResult} from "./ActionExecutor";
import {TriggerEvaluator} from "./TriggerEvaluator";

export interface RuleExecution {
    readonly ruleId: string;
    readonly result: ExecutionResult;
}

export interface TransactionRunResult {
    readonly transactionId: number;

    /**
     * Rules whose triggers matched, in evaluation order.
     */
    readonly matchedRuleIds: readonly string[];
    readonly ruleResults: readonly RuleExecution[];

    /**
     * True when a matching rule with stopProcessing ended the run.
     */
    readonly stoppedEarly: boolean;

    /**
     * False when the actions of any matched rule failed.
     */
    readonly success: boolean;
    readonly transaction: Transaction;
}

export interface RuleEngineOptions {
    readonly logger?: EngineLogger;
    readonly now?: () => Date;
}

/**
 * Orders rules for evaluation: active rules of active (or unknown) groups, by priority ascending.
 * Equal priorities are ordered by group execution order, ungrouped rules last, otherwise by input order.
 */
export function orderRules(rules: readonly Rule[], groups: readonly RuleGroup[] = []): Rule[] {
    const groupsById = new Map(groups.map(group => [group.id, group]));
    const executionOrder = (rule: Rule): number => {
        const group = rule.groupId === null ? undefined : groupsById.get(rule.groupId);
        return group ? group.executionOrder : Number.MAX_SAFE_INTEGER;
    };

    return rules
        .filter(rule => {
            if (!rule.isActive) {
                return false;
            }
            const group = rule.groupId === null ? undefined : groupsById.get(rule.groupId);
            return group === undefined || group.isActive;
        })
        .sort((a, b) => a.priority - b.priority || executionOrder(a) - executionOrder(b));
}

/**
 * Runs rules against one transaction. Each matching rule sees the transaction as left by the rules before it
 * and its actions are applied, together with its match statistics, in one unit of work.
 */
export class RuleEngine {

    private readonly evaluator: TriggerEvaluator;
    private readonly executor: ActionExecutor;
    private readonly logger: EngineLogger;
    private readonly now: () => Date;

    constructor(store: RuleStore, options: RuleEngineOptions = {}) {
        if (!store) {
            throw new Error('Rule store is required');
        }
        this.logger = options.logger ?? console;
        this.now = options.now ?? (() => new Date());
        this.evaluator = new TriggerEvaluator({logger: this.logger, now: this.now});
        this.executor = new ActionExecutor(store, {logger: this.logger});
    }

    get triggerEvaluator(): TriggerEvaluator {
        return this.evaluator;
    }

    /**
     * Rejects with StoreError when the store fails; action failures are reported in the result.
     */
    async apply(rules: readonly Rule[], transaction: Transaction, groups: readonly RuleGroup[] = []): Promise<TransactionRunResult> {
        return this.applyOrdered(orderRules(rules, groups), transaction);
    }

    /**
     * Same as apply for rules already passed through orderRules.
     */
    async applyOrdered(orderedRules: readonly Rule[], transaction: Transaction): Promise<TransactionRunResult> {
        const matchedRuleIds: string[] = [];
        const ruleResults: RuleExecution[] = [];
        let current = transaction;
        let stoppedEarly = false;

        for (const rule of orderedRules) {
            if (!this.evaluator.evaluateGroup(rule.triggerGroup, current)) {
                continue;
            }
            matchedRuleIds.push(rule.id);

            if (rule.actions.length === 0) {
                this.logger.warn(`Rule "${rule.name}" has no actions, skipping...`);
            } else {
                const result = await this.executor.execute(rule.actions, current, {
                    onApplied: (session) => session.persistRuleStatistics(rule.id, 1, this.now()),
                });
                ruleResults.push({ruleId: rule.id, result});
                current = result.transaction;
                this.logger.debug(`Rule "${rule.name}" applied to transaction ${transaction.id}: ${result.success ? 'ok' : 'rolled back'}`);
            }

            if (rule.stopProcessing) {
                stoppedEarly = true;
                break;
            }
        }

        return {
            transactionId: transaction.id,
            matchedRuleIds,
            ruleResults,
            stoppedEarly,
            success: ruleResults.every(execution => execution.result.success),
            transaction: current,
        };
    }
}
