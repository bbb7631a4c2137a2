import {Account, Category, Transaction} from "../entities/Transaction";

/**
 * Selects transactions for bulk runs and previews. All criteria are combined with AND.
 */
export interface TransactionFilter {
    readonly ids?: readonly number[];
    readonly accountId?: number;

    /**
     * Inclusive ISO day bounds.
     */
    readonly fromDate?: string;
    readonly toDate?: string;

    /**
     * Only transactions with a greater id. Used for keyset pagination.
     */
    readonly afterId?: number;
}

export interface RuleStatistics {
    readonly ruleId: string;
    readonly matchCount: number;
    readonly lastMatchedAt: Date | null;
}

/**
 * Operations available inside a unit of work.
 */
export interface RuleStoreSession {
    findAccountByName(name: string): Promise<Account | null>;

    /**
     * Returns the category with the given name (case-insensitive), creating it when missing.
     */
    findOrCreateCategoryByName(name: string): Promise<Category>;

    saveTransaction(transaction: Transaction): Promise<void>;

    persistRuleStatistics(ruleId: string, matchCountDelta: number, matchedAt: Date): Promise<void>;
}

/**
 * Persistence boundary of the rule engine. Implementations wrap failures in StoreError.
 */
export interface RuleStore extends RuleStoreSession {
    /**
     * Runs `work` as one unit of work. Everything written through the session is committed when
     * `work` resolves and rolled back when it rejects; the rejection is passed on.
     */
    atomic<R>(work: (session: RuleStoreSession) => Promise<R>): Promise<R>;

    /**
     * Transactions matching the filter, ordered by id.
     */
    fetchTransactions(filter: TransactionFilter, offset: number, limit: number): Promise<Transaction[]>;

    countTransactions(filter: TransactionFilter): Promise<number>;

    getRuleStatistics(ruleId: string): Promise<RuleStatistics | null>;
}
