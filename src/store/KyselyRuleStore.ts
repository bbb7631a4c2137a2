import {Kysely, SelectQueryBuilder} from 'kysely';
import {Account, Category, isTransactionType, Transaction} from "../entities/Transaction";
import {errorMessage, RuleEngineError, StoreError} from "../engine/errors";
import {Database, TransactionRow} from "./database.types";
import {RuleStatistics, RuleStore, RuleStoreSession, TransactionFilter} from "./RuleStore";

/**
 * RuleStore on top of a Kysely database (PostgreSQL in production, SQLite in tests).
 * A store created for a Kysely transaction runs nested units of work inside that transaction.
 */
export class KyselyRuleStore implements RuleStore {

    private readonly db: Kysely<Database>;

    constructor(db: Kysely<Database>) {
        if (!db) {
            throw new Error('Database connection is required');
        }
        this.db = db;
    }

    async atomic<R>(work: (session: RuleStoreSession) => Promise<R>): Promise<R> {
        if (this.db.isTransaction) {
            return await work(this);
        }

        // rejections of `work` pass through unchanged, failures of begin/commit become StoreError
        const outcome: { workFailed: boolean } = {workFailed: false};
        try {
            return await this.db.transaction().execute(async (trx) => {
                try {
                    return await work(new KyselyRuleStore(trx));
                } catch (error) {
                    outcome.workFailed = true;
                    throw error;
                }
            });
        } catch (error) {
            if (outcome.workFailed || error instanceof RuleEngineError) {
                throw error;
            }
            throw new StoreError(`Unit of work failed: ${errorMessage(error)}`, {cause: error});
        }
    }

    async fetchTransactions(filter: TransactionFilter, offset: number, limit: number): Promise<Transaction[]> {
        return this.guard('fetch transactions', async () => {
            const rows = await applyFilter(this.db.selectFrom('transactions').selectAll(), filter)
                .orderBy('transactions.id', 'asc')
                .limit(limit)
                .offset(offset)
                .execute();
            const accounts = await this.loadAccounts(rows);
            return rows.map(row => toTransaction(row, accounts));
        });
    }

    async countTransactions(filter: TransactionFilter): Promise<number> {
        return this.guard('count transactions', async () => {
            const query = this.db.selectFrom('transactions')
                .select(eb => eb.fn.countAll<number | string>().as('count'));
            const row = await applyFilter(query, filter).executeTakeFirstOrThrow();
            return Number(row.count);
        });
    }

    async findAccountByName(name: string): Promise<Account | null> {
        const wanted = name.trim();
        return this.guard(`find account "${wanted}"`, async () => {
            const account = await this.db
                .selectFrom('accounts')
                .selectAll()
                .where(eb => eb.or([
                    eb(eb.fn<string>('lower', ['name']), '=', wanted.toLowerCase()),
                    eb('iban', '=', wanted),
                ]))
                .orderBy('id', 'asc')
                .executeTakeFirst();
            return account ?? null;
        });
    }

    async findOrCreateCategoryByName(name: string): Promise<Category> {
        const wanted = name.trim();
        return this.guard(`find or create category "${wanted}"`, async () => {
            const existing = await this.db
                .selectFrom('categories')
                .selectAll()
                .where(eb => eb(eb.fn<string>('lower', ['name']), '=', wanted.toLowerCase()))
                .executeTakeFirst();
            if (existing) {
                return existing;
            }
            return await this.db
                .insertInto('categories')
                .values({name: wanted})
                .returningAll()
                .executeTakeFirstOrThrow();
        });
    }

    async saveTransaction(transaction: Transaction): Promise<void> {
        await this.guard(`save transaction ${transaction.id}`, async () => {
            const result = await this.db
                .updateTable('transactions')
                .set({
                    account_id: transaction.account?.id ?? null,
                    date: transaction.date,
                    amount: transaction.amount,
                    description: transaction.description,
                    counter_name: transaction.counterName,
                    counter_iban: transaction.counterIban,
                    standardized_name: transaction.standardizedName,
                    category_override: transaction.categoryOverride,
                    auto_category: transaction.autoCategory,
                    notes: transaction.notes,
                    transaction_type: transaction.transactionType,
                })
                .where('id', '=', transaction.id)
                .executeTakeFirst();
            if (Number(result.numUpdatedRows) === 0) {
                throw new StoreError(`Transaction ${transaction.id} does not exist`);
            }
        });
    }

    async persistRuleStatistics(ruleId: string, matchCountDelta: number, matchedAt: Date): Promise<void> {
        await this.guard(`persist statistics of rule "${ruleId}"`, async () => {
            const existing = await this.db
                .selectFrom('rule_statistics')
                .select('match_count')
                .where('rule_id', '=', ruleId)
                .executeTakeFirst();

            if (existing) {
                await this.db
                    .updateTable('rule_statistics')
                    .set({
                        match_count: Number(existing.match_count) + matchCountDelta,
                        last_matched_at: matchedAt.toISOString(),
                    })
                    .where('rule_id', '=', ruleId)
                    .execute();
            } else {
                await this.db
                    .insertInto('rule_statistics')
                    .values({rule_id: ruleId, match_count: matchCountDelta, last_matched_at: matchedAt.toISOString()})
                    .execute();
            }
        });
    }

    async getRuleStatistics(ruleId: string): Promise<RuleStatistics | null> {
        return this.guard(`read statistics of rule "${ruleId}"`, async () => {
            const row = await this.db
                .selectFrom('rule_statistics')
                .selectAll()
                .where('rule_id', '=', ruleId)
                .executeTakeFirst();
            if (!row) {
                return null;
            }
            return {
                ruleId: row.rule_id,
                matchCount: Number(row.match_count),
                lastMatchedAt: row.last_matched_at ? new Date(row.last_matched_at) : null,
            };
        });
    }

    private async loadAccounts(rows: readonly TransactionRow[]): Promise<Map<number, Account>> {
        const ids = [...new Set(rows.flatMap(row => row.account_id === null ? [] : [Number(row.account_id)]))];
        if (ids.length === 0) {
            return new Map();
        }
        const accounts = await this.db.selectFrom('accounts').selectAll().where('id', 'in', ids).execute();
        return new Map(accounts.map(account => [Number(account.id), {...account, id: Number(account.id)}]));
    }

    private async guard<R>(operation: string, work: () => Promise<R>): Promise<R> {
        try {
            return await work();
        } catch (error) {
            if (error instanceof RuleEngineError) {
                throw error;
            }
            throw new StoreError(`Failed to ${operation}: ${errorMessage(error)}`, {cause: error});
        }
    }
}

function applyFilter<O>(
    query: SelectQueryBuilder<Database, 'transactions', O>,
    filter: TransactionFilter,
): SelectQueryBuilder<Database, 'transactions', O> {
    let filtered = query;
    if (filter.ids !== undefined) {
        // an empty id list selects nothing
        filtered = filtered.where('transactions.id', 'in', filter.ids.length > 0 ? [...filter.ids] : [-1]);
    }
    if (filter.accountId !== undefined) {
        filtered = filtered.where('transactions.account_id', '=', filter.accountId);
    }
    if (filter.fromDate !== undefined) {
        filtered = filtered.where('transactions.date', '>=', filter.fromDate);
    }
    if (filter.toDate !== undefined) {
        filtered = filtered.where('transactions.date', '<=', filter.toDate);
    }
    if (filter.afterId !== undefined) {
        filtered = filtered.where('transactions.id', '>', filter.afterId);
    }
    return filtered;
}

function toTransaction(row: TransactionRow, accounts: ReadonlyMap<number, Account>): Transaction {
    return {
        id: Number(row.id),
        date: row.date,
        amount: row.amount,
        description: row.description,
        counterName: row.counter_name,
        counterIban: row.counter_iban,
        standardizedName: row.standardized_name,
        categoryOverride: row.category_override,
        autoCategory: row.auto_category,
        notes: row.notes,
        transactionType: isTransactionType(row.transaction_type) ? row.transaction_type : 'unknown',
        account: row.account_id === null ? null : accounts.get(Number(row.account_id)) ?? null,
    };
}
