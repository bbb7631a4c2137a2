import {Generated, Insertable, Selectable} from 'kysely';

export interface AccountTable {
    id: Generated<number>;
    name: string;
    iban: string;
}

export interface CategoryTable {
    id: Generated<number>;
    name: string;
}

export interface TransactionTable {
    id: Generated<number>;
    account_id: number | null;
    date: string;
    // decimal kept as text, exact on every dialect
    amount: string;
    description: string;
    counter_name: string | null;
    counter_iban: string | null;
    standardized_name: string | null;
    category_override: string | null;
    auto_category: string | null;
    notes: string | null;
    transaction_type: string;
}

export interface RuleStatisticsTable {
    rule_id: string;
    match_count: number;
    last_matched_at: string | null;
}

export interface Database {
    accounts: AccountTable;
    categories: CategoryTable;
    transactions: TransactionTable;
    rule_statistics: RuleStatisticsTable;
}

export type TransactionRow = Selectable<TransactionTable>;
export type NewTransaction = Insertable<TransactionTable>;
