import {Decimal} from 'decimal.js';
import {actionRequiresValue, RuleAction} from "../entities/Rule";
import {Account, Transaction} from "../entities/Transaction";
import {EngineLogger} from "../logger";
import {RuleStore, RuleStoreSession} from "../store/RuleStore";
import {errorMessage, ReferenceNotFoundError, RuleEngineError, StoreError, ValidationError} from "./errors";
import {
    addTag,
    appendMarker,
    EXTERNAL_ID_PREFIX,
    INTERNAL_REFERENCE_PREFIX,
    markDeleted,
    readTransferDestination,
    removeTag,
    writeTransferDestination,
} from "./notes";
import {formatDecimal, parseDecimal} from "./values";

export type ActionStatus = 'success' | 'failure' | 'skipped';

export interface ActionOutcome {
    readonly action: RuleAction;
    readonly status: ActionStatus;
    readonly error?: RuleEngineError;
}

export interface ExecutionResult {
    readonly outcomes: readonly ActionOutcome[];
    readonly successCount: number;
    readonly failureCount: number;

    /**
     * False when an action failed and the unit of work was rolled back.
     */
    readonly committed: boolean;
    readonly success: boolean;

    /**
     * The transaction as persisted after the call: the updated copy when committed, the input otherwise.
     */
    readonly transaction: Transaction;
    readonly error?: RuleEngineError;
}

export interface ExecuteOptions {
    /**
     * Runs inside the unit of work after all actions succeeded, before commit.
     */
    readonly onApplied?: (session: RuleStoreSession, transaction: Transaction) => Promise<void>;
}

export interface ActionExecutorOptions {
    readonly logger?: EngineLogger;
}

class ActionRollback extends Error {
    constructor(readonly failure: RuleEngineError) {
        super(failure.message);
    }
}

/**
 * Applies an ordered action list to a transaction as one unit of work.
 * The first failing action stops the list and rolls back everything written so far.
 */
export class ActionExecutor {

    private readonly store: RuleStore;
    private readonly logger: EngineLogger;

    constructor(store: RuleStore, options: ActionExecutorOptions = {}) {
        if (!store) {
            throw new Error('Rule store is required');
        }
        this.store = store;
        this.logger = options.logger ?? console;
    }

    /**
     * Runs the actions in order against a working copy and saves the result.
     * Action failures are reported in the result; StoreError and unexpected errors are thrown.
     */
    async execute(actions: readonly RuleAction[], transaction: Transaction, options: ExecuteOptions = {}): Promise<ExecutionResult> {
        const outcomes: ActionOutcome[] = [];

        try {
            const updated = await this.store.atomic(async (session) => {
                let working = transaction;
                for (let index = 0; index < actions.length; index++) {
                    const action = actions[index];
                    try {
                        working = await this.applyAction(action, working, session);
                        outcomes.push({action, status: 'success'});
                    } catch (error) {
                        if (!(error instanceof RuleEngineError) || error instanceof StoreError) {
                            throw error;
                        }
                        outcomes.push({action, status: 'failure', error});
                        for (const skipped of actions.slice(index + 1)) {
                            outcomes.push({action: skipped, status: 'skipped'});
                        }
                        throw new ActionRollback(error);
                    }
                }

                await session.saveTransaction(working);
                if (options.onApplied) {
                    await options.onApplied(session, working);
                }
                return working;
            });

            return {
                outcomes,
                successCount: outcomes.length,
                failureCount: 0,
                committed: true,
                success: true,
                transaction: updated,
            };
        } catch (error) {
            if (!(error instanceof ActionRollback)) {
                throw error;
            }
            this.logger.warn(`Actions on transaction ${transaction.id} rolled back: ${errorMessage(error.failure)}`);
            return {
                outcomes,
                successCount: outcomes.filter(outcome => outcome.status === 'success').length,
                failureCount: 1,
                committed: false,
                success: false,
                transaction,
                error: error.failure,
            };
        }
    }

    private async applyAction(action: RuleAction, tx: Transaction, session: RuleStoreSession): Promise<Transaction> {
        const value = action.value.trim();
        if (actionRequiresValue(action.type) && value === '') {
            throw new ValidationError(`${action.type} requires a value`);
        }

        switch (action.type) {
            case 'setCategory': {
                const category = await session.findOrCreateCategoryByName(value);
                return {...tx, categoryOverride: category.name};
            }
            case 'clearCategory':
                return {...tx, categoryOverride: null};
            case 'setNotes':
                return {...tx, notes: action.value};
            case 'setDescription':
                return {...tx, description: action.value};
            case 'appendDescription':
                return {...tx, description: tx.description + action.value};
            case 'prependDescription':
                return {...tx, description: action.value + tx.description};
            case 'addTag':
                return {...tx, notes: addTag(tx.notes, value)};
            case 'removeTag':
                return {...tx, notes: removeTag(tx.notes, value)};
            case 'clearAllTags':
                return {...tx, notes: null};
            case 'setCounterParty':
                return {...tx, counterName: value, standardizedName: value};
            case 'setSourceAccount':
                return {...tx, account: await this.requireAccount(session, value)};
            case 'setDestinationAccount': {
                const destination = await this.requireAccount(session, value);
                return {...tx, notes: writeTransferDestination(tx.notes, destination.name, destination.iban)};
            }
            case 'swapAccounts':
                return this.swapAccounts(tx, session);
            case 'convertToDeposit':
                return {...tx, transactionType: 'income', amount: formatDecimal(amountOf(tx).abs())};
            case 'convertToWithdrawal':
                return {...tx, transactionType: 'expense', amount: formatDecimal(amountOf(tx).abs().negated())};
            case 'convertToTransfer': {
                if (tx.account === null) {
                    throw new ReferenceNotFoundError(`Transaction ${tx.id} has no source account to transfer from`);
                }
                if (value === '') {
                    return {...tx, transactionType: 'transfer'};
                }
                const destination = await this.requireAccount(session, value);
                return {
                    ...tx,
                    transactionType: 'transfer',
                    notes: writeTransferDestination(tx.notes, destination.name, destination.iban),
                };
            }
            case 'deleteTransaction':
                this.logger.warn(`Transaction ${tx.id} marked as deleted by rule`);
                return {...tx, notes: markDeleted(tx.notes)};
            case 'setExternalId':
                return {...tx, notes: appendMarker(tx.notes, EXTERNAL_ID_PREFIX + value)};
            case 'setInternalReference':
                return {...tx, notes: appendMarker(tx.notes, INTERNAL_REFERENCE_PREFIX + value)};
            default: {
                const unknown: never = action.type;
                throw new ValidationError(`Unknown action type "${String(unknown)}"`);
            }
        }
    }

    private async swapAccounts(tx: Transaction, session: RuleStoreSession): Promise<Transaction> {
        const destinationName = readTransferDestination(tx.notes);
        if (destinationName === null) {
            throw new ReferenceNotFoundError(`Transaction ${tx.id} has no destination account to swap with`);
        }
        const destination = await this.requireAccount(session, destinationName);

        const notes = tx.account === null
            ? tx.notes
            : writeTransferDestination(tx.notes, tx.account.name, tx.account.iban);
        return {...tx, account: destination, notes, amount: formatDecimal(amountOf(tx).negated())};
    }

    private async requireAccount(session: RuleStoreSession, name: string): Promise<Account> {
        const account = await session.findAccountByName(name);
        if (account === null) {
            throw new ReferenceNotFoundError(`Account "${name}" not found`);
        }
        return account;
    }
}

function amountOf(tx: Transaction): Decimal {
    const amount = parseDecimal(tx.amount);
    if (amount === null) {
        throw new ValidationError(`Transaction ${tx.id} has an invalid amount "${tx.amount}"`);
    }
    return amount;
}
