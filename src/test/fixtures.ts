import {Kysely} from 'kysely'
import type {Account, Transaction} from '../entities/Transaction'
import type {Database, NewTransaction} from '../store/database.types'

export async function insertAccount(db: Kysely<Database>, name: string, iban: string): Promise<Account> {
    const row = await db.insertInto('accounts').values({name, iban}).returningAll().executeTakeFirstOrThrow()
    return {...row, id: Number(row.id)}
}

/**
 * Inserts a transaction with defaults for everything not given and returns its id.
 */
export async function insertTransaction(db: Kysely<Database>, values: Partial<NewTransaction> = {}): Promise<number> {
    const row = await db
        .insertInto('transactions')
        .values({
            account_id: null,
            date: '2024-03-15',
            amount: '-10.00',
            description: 'Card payment',
            transaction_type: 'expense',
            ...values
        })
        .returning('id')
        .executeTakeFirstOrThrow()
    return Number(row.id)
}

export async function categoryNames(db: Kysely<Database>): Promise<string[]> {
    const rows = await db.selectFrom('categories').select('name').orderBy('name').execute()
    return rows.map(row => row.name)
}

/**
 * In-memory transaction for tests that never touch the store.
 */
export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
    return {
        id: 1,
        date: '2024-03-15',
        amount: '-42.50',
        description: 'Card payment ALBERT HEIJN 1234',
        counterName: 'Albert Heijn',
        counterIban: 'NL00TEST0000000002',
        standardizedName: 'Albert Heijn',
        categoryOverride: null,
        autoCategory: null,
        notes: null,
        transactionType: 'expense',
        account: {id: 1, name: 'Checking', iban: 'NL00TEST0000000001'},
        ...overrides
    }
}
