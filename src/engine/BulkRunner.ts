import {Rule, RuleGroup} from "../entities/Rule";
import {Transaction} from "../entities/Transaction";
import {EngineLogger} from "../logger";
import {RuleStore, TransactionFilter} from "../store/RuleStore";
import {errorMessage} from "./errors";
import {orderRules, RuleEngine} from "./RuleEngine";

/**
 * Transactions to process: an in-memory list or everything the store returns for a filter.
 */
export type BulkSource =
    | { readonly transactions: readonly Transaction[] }
    | { readonly filter: TransactionFilter };

export interface BulkProgress {
    readonly processed: number;
    readonly total: number;
    readonly succeeded: number;
    readonly failed: number;
    readonly matched: number;

    /**
     * Zero-based index of the chunk just finished.
     */
    readonly chunk: number;
}

export interface BulkFailure {
    readonly transactionId: number;
    readonly reason: string;
}

export interface BulkRunSummary {
    readonly total: number;
    readonly processed: number;
    readonly succeeded: number;
    readonly failed: number;

    /**
     * Transactions matched by at least one rule.
     */
    readonly matched: number;
    readonly failures: readonly BulkFailure[];
    readonly ruleMatchCounts: Readonly<Record<string, number>>;
    readonly cancelled: boolean;
    readonly durationMs: number;
}

export interface BulkRunOptions {
    readonly groups?: readonly RuleGroup[];
    readonly onProgress?: (progress: BulkProgress) => void;

    /**
     * Checked before every chunk. Chunks already processed stay applied.
     */
    readonly signal?: AbortSignal;
}

export interface BulkRunnerOptions {
    readonly chunkSize: number;
    readonly logger?: EngineLogger;
}

export function formatBulkSummary(summary: BulkRunSummary): string {
    return `${summary.succeeded} applied, ${summary.failed} failed`;
}

/**
 * Applies rules to many transactions, one at a time, in fixed-size chunks.
 * A failing transaction is recorded and the run continues with the next one.
 */
export class BulkRunner {

    private readonly store: RuleStore;
    private readonly engine: RuleEngine;
    private readonly chunkSize: number;
    private readonly logger: EngineLogger;

    constructor(store: RuleStore, engine: RuleEngine, options: BulkRunnerOptions) {
        if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
            throw new Error(`Chunk size must be a positive integer, got ${options.chunkSize}`);
        }
        this.store = store;
        this.engine = engine;
        this.chunkSize = options.chunkSize;
        this.logger = options.logger ?? console;
    }

    async run(rules: readonly Rule[], source: BulkSource, options: BulkRunOptions = {}): Promise<BulkRunSummary> {
        const startedAt = Date.now();
        const orderedRules = orderRules(rules, options.groups);
        const total = 'transactions' in source
            ? source.transactions.length
            : await this.store.countTransactions(source.filter);

        const failures: BulkFailure[] = [];
        const ruleMatchCounts: Record<string, number> = {};
        let processed = 0;
        let succeeded = 0;
        let matched = 0;
        let cancelled = false;
        let chunkIndex = 0;

        const chunks = this.chunks(source);
        while (true) {
            if (options.signal?.aborted) {
                // an abort after the last chunk leaves nothing undone
                cancelled = processed < total;
                break;
            }
            const next = await chunks.next();
            if (next.done) {
                break;
            }
            for (const transaction of next.value) {
                try {
                    const result = await this.engine.applyOrdered(orderedRules, transaction);
                    for (const ruleId of result.matchedRuleIds) {
                        ruleMatchCounts[ruleId] = (ruleMatchCounts[ruleId] ?? 0) + 1;
                    }
                    if (result.matchedRuleIds.length > 0) {
                        matched++;
                    }
                    const failedRule = result.ruleResults.find(execution => !execution.result.success);
                    if (failedRule) {
                        failures.push({
                            transactionId: transaction.id,
                            reason: `Rule ${failedRule.ruleId}: ${errorMessage(failedRule.result.error)}`,
                        });
                    } else {
                        succeeded++;
                    }
                } catch (error) {
                    this.logger.error(`Transaction ${transaction.id} failed: ${errorMessage(error)}`);
                    failures.push({transactionId: transaction.id, reason: errorMessage(error)});
                }
                processed++;
            }

            options.onProgress?.({processed, total, succeeded, failed: failures.length, matched, chunk: chunkIndex});
            chunkIndex++;

            // let other work run between chunks
            await new Promise<void>(resolve => setImmediate(resolve));
        }

        const summary: BulkRunSummary = {
            total,
            processed,
            succeeded,
            failed: failures.length,
            matched,
            failures,
            ruleMatchCounts,
            cancelled,
            durationMs: Date.now() - startedAt,
        };
        this.logger.info(`Bulk run ${cancelled ? 'cancelled' : 'finished'}: ${formatBulkSummary(summary)} (${processed}/${total})`);
        return summary;
    }

    private async* chunks(source: BulkSource): AsyncGenerator<readonly Transaction[], void> {
        if ('transactions' in source) {
            for (let offset = 0; offset < source.transactions.length; offset += this.chunkSize) {
                yield source.transactions.slice(offset, offset + this.chunkSize);
            }
            return;
        }

        let afterId = source.filter.afterId;
        while (true) {
            const page = await this.store.fetchTransactions({...source.filter, afterId}, 0, this.chunkSize);
            if (page.length === 0) {
                return;
            }
            yield page;
            if (page.length < this.chunkSize) {
                return;
            }
            afterId = page[page.length - 1].id;
        }
    }
}
