/**
 * Direction of a transaction. Deposits are `income`, withdrawals are `expense`.
 */
export type TransactionType = 'income' | 'expense' | 'transfer' | 'unknown';

export const TRANSACTION_TYPES: readonly TransactionType[] = ['income', 'expense', 'transfer', 'unknown'];

/**
 * Category reported for transactions that have neither an override nor an auto-assigned category.
 */
export const UNCATEGORIZED = 'Uncategorized';

export interface Account {
    readonly id: number;
    readonly name: string;
    readonly iban: string;
}

export interface Category {
    readonly id: number;
    readonly name: string;
}

/**
 * A bank transaction as seen by the rule engine.
 * Rule actions never mutate an instance in place, they produce an updated copy.
 */
export interface Transaction {
    readonly id: number;

    /**
     * Booking day in ISO format (YYYY-MM-DD).
     */
    readonly date: string;

    /**
     * Signed decimal amount kept as text so no precision is lost between the store and the engine.
     * Negative for money leaving the account.
     */
    readonly amount: string;

    readonly description: string;
    readonly counterName: string | null;
    readonly counterIban: string | null;

    /**
     * Display name of the counter party, usually a cleaned-up version of counterName.
     */
    readonly standardizedName: string | null;

    /**
     * Category chosen by the user or by a rule. Wins over autoCategory.
     */
    readonly categoryOverride: string | null;
    readonly autoCategory: string | null;

    /**
     * Free text. Also carries tags and a few markers written by rule actions.
     */
    readonly notes: string | null;

    readonly transactionType: TransactionType;
    readonly account: Account | null;
}

export function isTransactionType(value: string): value is TransactionType {
    return TRANSACTION_TYPES.some(type => type === value);
}

export function effectiveCategory(transaction: Transaction): string {
    if (transaction.categoryOverride && transaction.categoryOverride.trim() !== '') {
        return transaction.categoryOverride;
    }
    if (transaction.autoCategory && transaction.autoCategory.trim() !== '') {
        return transaction.autoCategory;
    }
    return UNCATEGORIZED;
}
