import {Kysely} from 'kysely';
import {Database} from "./database.types";

export type IdentityStrategy = 'identity' | 'autoincrement';

/**
 * Creates the tables used by the rule store.
 * PostgreSQL uses generated identity columns, SQLite uses autoincrement.
 */
export async function createSchema(db: Kysely<Database>, identity: IdentityStrategy): Promise<void> {
    await db.schema
        .createTable('accounts')
        .ifNotExists()
        .addColumn('id', 'integer', col => identity === 'identity'
            ? col.primaryKey().generatedAlwaysAsIdentity()
            : col.primaryKey().autoIncrement())
        .addColumn('name', 'text', col => col.notNull())
        .addColumn('iban', 'text', col => col.notNull())
        .execute();

    await db.schema
        .createTable('categories')
        .ifNotExists()
        .addColumn('id', 'integer', col => identity === 'identity'
            ? col.primaryKey().generatedAlwaysAsIdentity()
            : col.primaryKey().autoIncrement())
        .addColumn('name', 'text', col => col.notNull().unique())
        .execute();

    await db.schema
        .createTable('transactions')
        .ifNotExists()
        .addColumn('id', 'integer', col => identity === 'identity'
            ? col.primaryKey().generatedAlwaysAsIdentity()
            : col.primaryKey().autoIncrement())
        .addColumn('account_id', 'integer', col => col.references('accounts.id').onDelete('set null'))
        .addColumn('date', 'text', col => col.notNull())
        .addColumn('amount', 'text', col => col.notNull())
        .addColumn('description', 'text', col => col.notNull().defaultTo(''))
        .addColumn('counter_name', 'text')
        .addColumn('counter_iban', 'text')
        .addColumn('standardized_name', 'text')
        .addColumn('category_override', 'text')
        .addColumn('auto_category', 'text')
        .addColumn('notes', 'text')
        .addColumn('transaction_type', 'text', col => col.notNull().defaultTo('unknown'))
        .execute();

    await db.schema
        .createTable('rule_statistics')
        .ifNotExists()
        .addColumn('rule_id', 'text', col => col.primaryKey())
        .addColumn('match_count', 'integer', col => col.notNull().defaultTo(0))
        .addColumn('last_matched_at', 'text')
        .execute();

    await db.schema.createIndex('idx_transactions_account_id').ifNotExists().on('transactions').column('account_id').execute();
    await db.schema.createIndex('idx_transactions_date').ifNotExists().on('transactions').column('date').execute();
}
