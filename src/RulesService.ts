import {Kysely} from "kysely";
import {EngineConfig, EngineOptions, resolveEngineConfig, resolveLogger} from "./config";
import {BulkRunner, BulkRunOptions, BulkRunSummary, BulkSource} from "./engine/BulkRunner";
import {RuleEngine, TransactionRunResult} from "./engine/RuleEngine";
import {TriggerEvaluator, TriggerValidationResult} from "./engine/TriggerEvaluator";
import {Rule, RuleGroup, Trigger, TriggerGroup} from "./entities/Rule";
import {Transaction} from "./entities/Transaction";
import {EngineLogger} from "./logger";
import {KyselyRuleStore} from "./store/KyselyRuleStore";
import {Database} from "./store/database.types";
import {RuleStatistics, RuleStore, TransactionFilter} from "./store/RuleStore";

export interface RulePreview {
    /**
     * Transactions the rule would match.
     */
    readonly matched: number;
    readonly scanned: number;
}

export interface BulkRunHandle {
    /**
     * Requests cancellation. The run stops after the chunk in progress.
     */
    cancel(): void;
    readonly result: Promise<BulkRunSummary>;
}

/**
 * Entry point of the rule engine: evaluation, previews and rule runs against a store.
 */
export class RulesService {

    readonly config: EngineConfig;

    private readonly store: RuleStore;
    private readonly logger: EngineLogger;
    private readonly engine: RuleEngine;
    private readonly runner: BulkRunner;

    public constructor(store: RuleStore, options: EngineOptions = {}) {
        if (!store) {
            throw new Error('Rule store is required');
        }
        this.store = store;
        this.config = resolveEngineConfig(options);
        this.logger = resolveLogger(options);
        this.engine = new RuleEngine(store, {logger: this.logger, now: options.now});
        this.runner = new BulkRunner(store, this.engine, {chunkSize: this.config.chunkSize, logger: this.logger});
    }

    /**
     * Creates a service backed by a Kysely database with the rule engine schema.
     */
    public static forDatabase(db: Kysely<Database>, options: EngineOptions = {}): RulesService {
        return new RulesService(new KyselyRuleStore(db), options);
    }

    public evaluateTriggerGroup(group: TriggerGroup | null, transaction: Transaction): boolean {
        return this.evaluator.evaluateGroup(group, transaction);
    }

    public validateTrigger(trigger: Trigger): TriggerValidationResult {
        return this.evaluator.validate(trigger);
    }

    /**
     * Dry run: whether the rule's triggers match the transaction. Inactive rules are evaluated too.
     */
    public testRule(rule: Rule, transaction: Transaction): boolean {
        return this.evaluator.evaluateGroup(rule.triggerGroup, transaction);
    }

    /**
     * Counts the stored transactions the rule matches without changing anything.
     */
    public async previewRule(rule: Rule, filter: TransactionFilter = {}): Promise<RulePreview> {
        let matched = 0;
        let scanned = 0;
        let afterId = filter.afterId;

        while (true) {
            const page = await this.store.fetchTransactions({...filter, afterId}, 0, this.config.chunkSize);
            for (const transaction of page) {
                if (this.evaluator.evaluateGroup(rule.triggerGroup, transaction)) {
                    matched++;
                }
            }
            scanned += page.length;
            if (page.length < this.config.chunkSize) {
                return {matched, scanned};
            }
            afterId = page[page.length - 1].id;
        }
    }

    /**
     * Applies rules to a single transaction.
     */
    public async applyToTransaction(rules: readonly Rule[], transaction: Transaction, groups: readonly RuleGroup[] = []): Promise<TransactionRunResult> {
        return this.engine.apply(rules, transaction, groups);
    }

    /**
     * Applies one rule, even when it is inactive.
     */
    public async applyRule(rule: Rule, source: BulkSource, options: BulkRunOptions = {}): Promise<BulkRunSummary> {
        return this.runner.run([{...rule, isActive: true}], source, {...options, groups: []});
    }

    public async applyAllActiveRules(rules: readonly Rule[], source: BulkSource, options: BulkRunOptions = {}): Promise<BulkRunSummary> {
        return this.runner.run(rules, source, options);
    }

    public async getRuleStatistics(ruleId: string): Promise<RuleStatistics | null> {
        return this.store.getRuleStatistics(ruleId);
    }

    /**
     * Starts a bulk run in the background. Cancelling keeps the chunks already applied.
     */
    public startBulkRun(rules: readonly Rule[], source: BulkSource, options: BulkRunOptions = {}): BulkRunHandle {
        const controller = new AbortController();
        const external = options.signal;
        const onAbort = () => controller.abort();
        if (external?.aborted) {
            controller.abort();
        } else {
            external?.addEventListener('abort', onAbort, {once: true});
        }

        const result = this.runner.run(rules, source, {...options, signal: controller.signal});
        return {
            cancel: () => controller.abort(),
            result: external ? result.finally(() => external.removeEventListener('abort', onAbort)) : result,
        };
    }

    private get evaluator(): TriggerEvaluator {
        return this.engine.triggerEvaluator;
    }
}
